import type { SessionTracker } from "../core/tracker.js";
import type { Classification, Identity, SessionSnapshot } from "../core/types.js";
import { log } from "../shared/logging.js";

export interface ScanSource {
  scan(): Promise<Set<string>>;
}

export interface ScanLoopOptions {
  tracker: SessionTracker;
  source: ScanSource;
  intervalMs: number;
  /** Stop scheduling after this many recorded scans and call `onLimitReached`. */
  maxScans?: number;
  onLimitReached?: () => void;
}

/**
 * Drives a tracker: scan, record, wait `intervalMs`, repeat. The next scan is
 * only scheduled once the previous result has been recorded, so recordings
 * never overlap. A result that resolves after `stop()` is dropped.
 */
export class ScanLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pending: Promise<void> | null = null;

  constructor(private readonly options: ScanLoopOptions) {}

  start(identities: readonly Identity[], thresholdRatio: number): SessionSnapshot {
    const snapshot = this.options.tracker.start(
      identities,
      thresholdRatio,
      this.options.intervalMs
    );
    this.schedule(0);
    return snapshot;
  }

  stop(): Classification[] {
    const classifications = this.options.tracker.stop();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    return classifications;
  }

  /** Resolves once no scan is in flight. */
  async settled(): Promise<void> {
    await this.pending;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pending = this.cycle()
        .catch((err: unknown) => {
          log.error(`Scan cycle failed: ${err instanceof Error ? err.message : String(err)}`);
        })
        .finally(() => {
          this.pending = null;
        });
    }, delayMs);
  }

  private async cycle(): Promise<void> {
    const { tracker, source, intervalMs, maxScans } = this.options;
    let found: Set<string>;
    try {
      found = await source.scan();
    } catch (err) {
      log.warn(`Scan failed, counting it as empty: ${err instanceof Error ? err.message : String(err)}`);
      found = new Set();
    }

    if (tracker.state !== "running") {
      log.debug("Dropping a scan result that arrived after the session stopped");
      return;
    }
    const record = tracker.recordScan(found);

    if (maxScans !== undefined && record.scan >= maxScans) {
      log.debug(`Scan limit of ${maxScans} reached`);
      this.options.onLimitReached?.();
      return;
    }
    if (tracker.state === "running") this.schedule(intervalMs);
  }
}
