import { InvalidConfigurationError, InvalidStateError } from "../shared/errors.js";
import { log } from "../shared/logging.js";
import { isPresent, isValidThreshold, requiredDetections } from "./threshold.js";
import type {
  Classification,
  Identity,
  ScanRecord,
  SessionSnapshot,
  SessionStatus,
} from "./types.js";

export interface SessionTrackerOptions {
  /** Called after every recorded scan with the human-readable line for that cycle. */
  onScan?: (record: ScanRecord) => void;
  now?: () => number;
}

export function formatScanLine(
  scan: number,
  seen: Array<{ identity: Identity; detectionCount: number }>,
  missed: Identity[]
): string {
  const detected = seen.length
    ? seen.map((s) => `${s.identity.displayName} (${s.detectionCount})`).join(", ")
    : "none";
  const notFound = missed.length ? missed.map((i) => i.displayName).join(", ") : "none";
  return `[SCAN ${scan}] Detected: ${detected}; Not found: ${notFound}`;
}

/**
 * Counts, for one session, in how many scans each registered identity was
 * discovered, and classifies everyone once the session stops.
 *
 * Lifecycle is `not_started -> running -> stopped`; a stopped tracker never
 * runs again, a new session needs a new tracker. Callers must not overlap
 * `recordScan` with another `recordScan` or with `stop`.
 */
export class SessionTracker {
  private status: SessionStatus = "not_started";
  private identities: readonly Identity[] = [];
  private readonly counts = new Map<string, number>();
  private totalScans = 0;
  private thresholdRatio = 0;
  private scanIntervalMs = 0;

  constructor(private readonly options: SessionTrackerOptions = {}) {}

  get state(): SessionStatus {
    return this.status;
  }

  start(
    registry: readonly Identity[],
    thresholdRatio: number,
    scanIntervalMs: number
  ): SessionSnapshot {
    if (this.status !== "not_started") {
      throw new InvalidStateError(`Cannot start a session that is already ${this.status}`);
    }
    if (!isValidThreshold(thresholdRatio)) {
      throw new InvalidConfigurationError(
        `Threshold ratio must be in (0, 1], got ${thresholdRatio}`
      );
    }
    if (!Number.isFinite(scanIntervalMs) || scanIntervalMs <= 0) {
      throw new InvalidConfigurationError(
        `Scan interval must be a positive number of milliseconds, got ${scanIntervalMs}`
      );
    }
    if (registry.length === 0) {
      throw new InvalidConfigurationError("No identities are registered");
    }
    const seenIds = new Set<string>();
    for (const identity of registry) {
      if (seenIds.has(identity.identifier)) {
        throw new InvalidConfigurationError(`Duplicate identifier ${identity.identifier}`);
      }
      seenIds.add(identity.identifier);
    }

    this.identities = registry.map((i) => Object.freeze({ ...i }));
    for (const identity of this.identities) this.counts.set(identity.identifier, 0);
    this.totalScans = 0;
    this.thresholdRatio = thresholdRatio;
    this.scanIntervalMs = scanIntervalMs;
    this.status = "running";

    log.info(
      `Session started: ${this.identities.length} identities, threshold ${Math.round(thresholdRatio * 100)}%, scanning every ${scanIntervalMs} ms`
    );
    return this.snapshot();
  }

  recordScan(discovered: Iterable<string>): ScanRecord {
    if (this.status !== "running") {
      throw new InvalidStateError(`Cannot record a scan while the session is ${this.status}`);
    }
    const found = new Set(discovered);
    const seen: Array<{ identity: Identity; detectionCount: number }> = [];
    const missed: Identity[] = [];
    let tracked = 0;

    for (const identity of this.identities) {
      const current = this.counts.get(identity.identifier) ?? 0;
      if (found.has(identity.identifier)) {
        tracked += 1;
        this.counts.set(identity.identifier, current + 1);
        seen.push({ identity, detectionCount: current + 1 });
      } else {
        missed.push(identity);
      }
    }
    this.totalScans += 1;

    const record: ScanRecord = {
      scan: this.totalScans,
      at: (this.options.now ?? Date.now)(),
      seen: seen.map((s) => s.identity),
      missed,
      unknown: found.size - tracked,
      line: formatScanLine(this.totalScans, seen, missed),
    };
    log.info(record.line);
    if (record.unknown > 0) {
      log.debug(`[SCAN ${record.scan}] ignored ${record.unknown} unregistered device(s)`);
    }
    this.options.onScan?.(record);
    return record;
  }

  /** Freezes the counters and classifies every tracked identity, in registration order. */
  stop(): Classification[] {
    if (this.status !== "running") {
      throw new InvalidStateError(`Cannot stop a session that is ${this.status}`);
    }
    this.status = "stopped";

    const required = requiredDetections(this.thresholdRatio, this.totalScans);
    const classifications = this.identities.map((identity) => {
      const detectionCount = this.counts.get(identity.identifier) ?? 0;
      return Object.freeze({
        identity,
        detectionCount,
        totalScans: this.totalScans,
        requiredDetections: required,
        present: isPresent(detectionCount, this.totalScans, this.thresholdRatio),
      });
    });

    log.info(
      `Session stopped after ${this.totalScans} scans (${required} detections required)`
    );
    return classifications;
  }

  snapshot(): SessionSnapshot {
    return {
      status: this.status,
      totalScans: this.totalScans,
      thresholdRatio: this.thresholdRatio,
      scanIntervalMs: this.scanIntervalMs,
      counts: this.identities.map((identity) => ({
        identity,
        detectionCount: this.counts.get(identity.identifier) ?? 0,
      })),
    };
  }
}
