/** A registered person and the device identifier that stands in for them. */
export interface Identity {
  identifier: string;
  displayName: string;
}

export type SessionStatus = "not_started" | "running" | "stopped";

export interface SessionSnapshot {
  status: SessionStatus;
  totalScans: number;
  thresholdRatio: number;
  scanIntervalMs: number;
  /** Detection counts in registration order. */
  counts: Array<{ identity: Identity; detectionCount: number }>;
}

/** Final present/absent decision for one identity. Frozen once created. */
export interface Classification {
  readonly identity: Identity;
  readonly detectionCount: number;
  readonly totalScans: number;
  /** Smallest detection count that satisfies the threshold for this session. */
  readonly requiredDetections: number;
  readonly present: boolean;
}

/** One completed scan cycle, as seen by the tracker. */
export interface ScanRecord {
  scan: number;
  at: number;
  seen: Identity[];
  missed: Identity[];
  /** Discovered identifiers that are not tracked in this session. */
  unknown: number;
  line: string;
}
