import { SessionTracker } from "../core/tracker.js";
import type { Identity, ScanRecord, SessionSnapshot } from "../core/types.js";
import type { WritableIdentityRegistry } from "../registry/types.js";
import { buildReport } from "../report/build.js";
import type { AttendanceReport, ReportEmitter, SessionLabels } from "../report/types.js";
import { MAX_TIMER_MS, SCAN_LOG_CAPACITY } from "../shared/constants.js";
import { InvalidConfigurationError, InvalidStateError } from "../shared/errors.js";
import { genId } from "../shared/ids.js";
import { log } from "../shared/logging.js";
import { RingBuffer } from "../shared/ring-buffer.js";
import type { SessionArchive } from "../shared/session/store.js";
import { ScanLoop, type ScanSource } from "./scan-loop.js";

export interface StartSessionInput {
  thresholdRatio: number;
  scanIntervalMs: number;
  labels?: SessionLabels;
  /** Stop on its own after this many scans. */
  maxScans?: number;
  /** Stop on its own after this long. */
  maxDurationMs?: number;
}

export interface AttendanceControllerDeps {
  registry: WritableIdentityRegistry;
  source: ScanSource;
  archive: SessionArchive;
  emitters?: ReportEmitter[];
  now?: () => number;
  onScan?: (record: ScanRecord) => void;
  /** Receives the report of a session that stopped itself on a scan or time limit. */
  onAutoStop?: (report: AttendanceReport) => void;
}

export interface ActiveSessionView {
  id: string;
  startedAt: number;
  labels: SessionLabels;
  snapshot: SessionSnapshot;
  recentScans: ScanRecord[];
}

interface ActiveSession {
  id: string;
  startedAt: number;
  labels: SessionLabels;
  tracker: SessionTracker;
  loop: ScanLoop;
  scans: RingBuffer<ScanRecord>;
  deadline: ReturnType<typeof setTimeout> | null;
}

/**
 * Owns at most one running session: takes start/stop commands from the CLI
 * or the control server, and on stop hands the report to the archive and
 * the emitters. Registration goes through here so it can be refused while a
 * session is running.
 */
export class AttendanceController {
  private active: ActiveSession | null = null;
  private starting = false;
  private lastLoop: ScanLoop | null = null;

  constructor(private readonly deps: AttendanceControllerDeps) {}

  get isRunning(): boolean {
    return this.active?.tracker.state === "running";
  }

  /**
   * Starts a session once the previous session's in-flight scan, if any, has
   * finished, so discovery passes on the shared source never overlap.
   */
  async start(input: StartSessionInput): Promise<ActiveSessionView> {
    this.assertIdle();
    if (input.maxScans !== undefined && (!Number.isInteger(input.maxScans) || input.maxScans <= 0)) {
      throw new InvalidConfigurationError(`Scan limit must be a positive integer, got ${input.maxScans}`);
    }
    if (input.scanIntervalMs > MAX_TIMER_MS) {
      throw new InvalidConfigurationError(
        `Scan interval must be at most ${MAX_TIMER_MS} ms, got ${input.scanIntervalMs}`
      );
    }
    if (
      input.maxDurationMs !== undefined &&
      (!Number.isFinite(input.maxDurationMs) || input.maxDurationMs <= 0 || input.maxDurationMs > MAX_TIMER_MS)
    ) {
      throw new InvalidConfigurationError(
        `Session duration must be between 1 and ${MAX_TIMER_MS} ms, got ${input.maxDurationMs}`
      );
    }

    this.starting = true;
    try {
      await this.settled();
    } finally {
      this.starting = false;
    }

    const now = this.deps.now ?? Date.now;
    const scans = new RingBuffer<ScanRecord>(SCAN_LOG_CAPACITY);
    const tracker = new SessionTracker({
      now,
      onScan: (record) => {
        scans.push(record);
        this.deps.onScan?.(record);
      },
    });
    const loop = new ScanLoop({
      tracker,
      source: this.deps.source,
      intervalMs: input.scanIntervalMs,
      maxScans: input.maxScans,
      onLimitReached: () => this.autoStop("scan limit reached"),
    });

    const identities: Identity[] = this.deps.registry.list();
    loop.start(identities, input.thresholdRatio);

    const session: ActiveSession = {
      id: genId("sess"),
      startedAt: now(),
      labels: { ...input.labels },
      tracker,
      loop,
      scans,
      deadline: null,
    };
    if (input.maxDurationMs !== undefined) {
      session.deadline = setTimeout(() => this.autoStop("time limit reached"), input.maxDurationMs);
    }
    this.active = session;
    this.lastLoop = loop;
    log.debug(`Session ${session.id} running`);
    return this.view(session);
  }

  current(): ActiveSessionView | undefined {
    return this.active ? this.view(this.active) : undefined;
  }

  async stop(): Promise<AttendanceReport> {
    const session = this.active;
    if (!session) {
      throw new InvalidStateError("No attendance session is running");
    }
    const classifications = session.loop.stop();
    this.active = null;
    if (session.deadline) clearTimeout(session.deadline);

    const snapshot = session.tracker.snapshot();
    const report = buildReport({
      id: session.id,
      startedAt: session.startedAt,
      stoppedAt: (this.deps.now ?? Date.now)(),
      thresholdRatio: snapshot.thresholdRatio,
      scanIntervalMs: snapshot.scanIntervalMs,
      labels: session.labels,
      classifications,
    });

    try {
      this.deps.archive.save(report);
    } catch (err) {
      log.error(
        `Could not archive session ${report.id}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    for (const emitter of this.deps.emitters ?? []) {
      try {
        await emitter.emit(report);
      } catch (err) {
        log.error(
          `Could not write ${emitter.name} report for ${report.id}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
    return report;
  }

  /** Resolves once the last session's in-flight scan, if any, has finished. */
  async settled(): Promise<void> {
    await this.lastLoop?.settled();
  }

  async register(identifier: string, displayName: string): Promise<Identity> {
    this.assertRegistrationOpen();
    return this.deps.registry.register(identifier, displayName);
  }

  async unregister(identifier: string): Promise<boolean> {
    this.assertRegistrationOpen();
    return this.deps.registry.remove(identifier);
  }

  private assertIdle(): void {
    if (this.active) {
      throw new InvalidStateError(`Session ${this.active.id} is already running`);
    }
    if (this.starting) {
      throw new InvalidStateError("A session is already starting");
    }
  }

  private assertRegistrationOpen(): void {
    if (this.active || this.starting) {
      throw new InvalidStateError("Registration is closed while a session is running");
    }
  }

  private autoStop(reason: string): void {
    if (!this.active) return;
    log.info(`Stopping session ${this.active.id}: ${reason}`);
    this.stop()
      .then((report) => this.deps.onAutoStop?.(report))
      .catch((err: unknown) => {
        log.error(`Automatic stop failed: ${err instanceof Error ? err.message : String(err)}`);
      });
  }

  private view(session: ActiveSession): ActiveSessionView {
    return {
      id: session.id,
      startedAt: session.startedAt,
      labels: { ...session.labels },
      snapshot: session.tracker.snapshot(),
      recentScans: session.scans.toArray(),
    };
  }
}
