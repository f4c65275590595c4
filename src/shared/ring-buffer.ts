/** Fixed-size ring buffer; `toArray` returns items oldest first. */
export class RingBuffer<T> {
  private buffer: T[] = [];
  private index = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
    } else {
      this.buffer[this.index] = item;
    }
    this.index = (this.index + 1) % this.capacity;
  }

  toArray(): T[] {
    if (this.buffer.length < this.capacity) return [...this.buffer];
    return [...this.buffer.slice(this.index), ...this.buffer.slice(0, this.index)];
  }
}
