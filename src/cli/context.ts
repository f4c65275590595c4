import {
  ensureDefaultConfig,
  getArchivePath,
  getDataDir,
  getRegistryPath,
  readConfig,
  type Config,
  type RunSettings,
} from "../config.js";
import { createDiscoverySource, type DiscoverySource } from "../discovery/index.js";
import { createFileRegistry } from "../registry/file.js";
import type { WritableIdentityRegistry } from "../registry/types.js";
import { createConsoleEmitter, createCsvFileEmitter } from "../report/emitters.js";
import type { AttendanceReport, ReportEmitter } from "../report/types.js";
import { AttendanceController } from "../runner/controller.js";
import type { ScanRecord } from "../core/types.js";
import { createSqliteSessionArchive, type SessionArchive } from "../shared/session/index.js";
import { setupLogging, type GlobalOptions } from "./utils.js";

export interface CliContext {
  dataDir: string;
  config: Config;
  registry: WritableIdentityRegistry;
}

/** Data dir, config, logging and registry: what every command needs. */
export async function loadContext(opts: GlobalOptions): Promise<CliContext> {
  const dataDir = getDataDir(opts.dataDir);
  await ensureDefaultConfig(dataDir);
  const config = await readConfig(dataDir);
  setupLogging(opts, config["log.level"]);
  const registry = await createFileRegistry(getRegistryPath(dataDir));
  return { dataDir, config, registry };
}

export function openArchive(ctx: CliContext): Promise<SessionArchive> {
  return createSqliteSessionArchive(getArchivePath(ctx.dataDir));
}

export interface Runtime {
  source: DiscoverySource;
  archive: SessionArchive;
  controller: AttendanceController;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  csv: boolean;
  console: boolean;
  onScan?: (record: ScanRecord) => void;
  onAutoStop?: (report: AttendanceReport) => void;
}

/** Discovery backend, archive, emitters and controller for a session-running command. */
export async function createRuntime(
  ctx: CliContext,
  settings: RunSettings,
  options: RuntimeOptions
): Promise<Runtime> {
  const source = createDiscoverySource(settings.discovery, {
    registry: ctx.registry,
    durationMs: settings.scanDurationMs,
  });
  await source.open();
  const archive = await openArchive(ctx);

  const emitters: ReportEmitter[] = [];
  if (options.console) emitters.push(createConsoleEmitter());
  if (options.csv) emitters.push(createCsvFileEmitter(settings.reportDir));

  const controller = new AttendanceController({
    registry: ctx.registry,
    source,
    archive,
    emitters,
    onScan: options.onScan,
    onAutoStop: options.onAutoStop,
  });

  return {
    source,
    archive,
    controller,
    async close() {
      await controller.settled();
      await source.close();
      archive.close();
    },
  };
}
