import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import {
  ARCHIVE_FILENAME,
  CONFIG_FILENAME,
  DEFAULT_SCAN_DURATION_MS,
  DEFAULT_SCAN_INTERVAL_MS,
  DEFAULT_THRESHOLD,
  MAX_TIMER_MS,
  REGISTRY_FILENAME,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { InvalidConfigurationError } from "./shared/errors.js";
import type { DiscoveryKind } from "./discovery/types.js";

export function getDataDir(custom?: string): string {
  if (custom) return path.resolve(custom.replace(/^~(?=$|\/)/, homedir()));
  const fromEnv = getEnv("DATA_DIR");
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(homedir(), ".rollcall");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export function getRegistryPath(dataDir: string): string {
  return path.join(dataDir, REGISTRY_FILENAME);
}

export function getArchivePath(dataDir: string): string {
  return path.join(dataDir, ARCHIVE_FILENAME);
}

const ThresholdSchema = z.coerce
  .number()
  .gt(0, "threshold must be greater than 0")
  .lte(1, "threshold must be at most 1");
const MillisSchema = z.coerce.number().int().positive().max(MAX_TIMER_MS);
const DiscoverySchema = z.enum(["ble", "simulated"]);
const LogLevelSchema = z.enum(["error", "warn", "info", "debug"]);

/** Config file shape. Keys are flat and dotted, as `config get/set` names them. */
export const ConfigSchema = z
  .object({
    threshold: ThresholdSchema.default(DEFAULT_THRESHOLD),
    "scan.intervalMs": MillisSchema.default(DEFAULT_SCAN_INTERVAL_MS),
    "scan.durationMs": MillisSchema.default(DEFAULT_SCAN_DURATION_MS),
    discovery: DiscoverySchema.default("ble"),
    "log.level": LogLevelSchema.default("info"),
    "report.dir": z.string().min(1).optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof Config;

const CONFIG_KEYS: readonly ConfigKey[] = [
  "threshold",
  "scan.intervalMs",
  "scan.durationMs",
  "discovery",
  "log.level",
  "report.dir",
];

export function isConfigKey(s: string): s is ConfigKey {
  return CONFIG_KEYS.some((key) => key === s);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(data: unknown, source = "config"): Config {
  const result = ConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new InvalidConfigurationError(`Invalid ${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

async function readRawConfig(dataDir: string): Promise<Record<string, unknown>> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new InvalidConfigurationError(`Invalid ${configPath}: not valid JSON`);
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new InvalidConfigurationError(`Invalid ${configPath}: expected a JSON object`);
  }
  return { ...data };
}

export async function readConfig(dataDir: string): Promise<Config> {
  return parseConfig(await readRawConfig(dataDir), getConfigPath(dataDir));
}

export async function writeConfig(dataDir: string, cfg: Config): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  await writeFile(getConfigPath(dataDir), JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

/** Ensure a config file exists with defaults. Called on first CLI entry. */
export async function ensureDefaultConfig(dataDir: string): Promise<void> {
  const configPath = getConfigPath(dataDir);
  try {
    await readFile(configPath, "utf8");
    return;
  } catch {
    try {
      await writeConfig(dataDir, parseConfig({}));
    } catch (error) {
      // Read-only homes (sandboxes, CI) still run on in-memory defaults.
      const code = error instanceof Error && "code" in error ? error.code : undefined;
      if (code === "EPERM" || code === "EACCES" || code === "EROFS") return;
      throw error;
    }
  }
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | undefined> {
  const cfg = await readConfig(dataDir);
  const value = cfg[key];
  return value === undefined ? undefined : String(value);
}

export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<Config> {
  const raw = await readRawConfig(dataDir);
  const next = parseConfig({ ...raw, [key]: value }, `value for ${key}`);
  await writeConfig(dataDir, next);
  return next;
}

export interface RunSettingsFlags {
  threshold?: string;
  interval?: string;
  scanDuration?: string;
  discovery?: string;
  reportDir?: string;
}

export interface RunSettings {
  thresholdRatio: number;
  scanIntervalMs: number;
  scanDurationMs: number;
  discovery: DiscoveryKind;
  reportDir: string;
}

/** Resolve session settings: flag, then environment, then config file, then default. */
export function resolveRunSettings(flags: RunSettingsFlags, cfg: Config): RunSettings {
  const pick = <T>(schema: z.ZodType<T>, label: string, ...candidates: Array<string | undefined>): T | undefined => {
    const value = candidates.find((c) => c !== undefined && c !== "");
    if (value === undefined) return undefined;
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidConfigurationError(`Invalid ${label} "${value}": ${describeIssues(result.error)}`);
    }
    return result.data;
  };

  return {
    thresholdRatio:
      pick(ThresholdSchema, "threshold", flags.threshold, getEnv("THRESHOLD")) ?? cfg.threshold,
    scanIntervalMs: pick(MillisSchema, "interval", flags.interval) ?? cfg["scan.intervalMs"],
    scanDurationMs:
      pick(MillisSchema, "scan duration", flags.scanDuration) ?? cfg["scan.durationMs"],
    discovery:
      pick(DiscoverySchema, "discovery", flags.discovery, getEnv("DISCOVERY")) ?? cfg.discovery,
    reportDir: path.resolve(flags.reportDir ?? cfg["report.dir"] ?? process.cwd()),
  };
}
