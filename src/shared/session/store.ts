import type { ArchivedSession } from "./types.js";

export interface SessionArchive {
  save(session: ArchivedSession): void;
  get(id: string): ArchivedSession | undefined;
  /** Most recently stopped first. */
  list(): ArchivedSession[];
  delete(id: string): boolean;
  close(): void;
}
