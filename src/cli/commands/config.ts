import { configGet, configSet, getConfigPath, getDataDir, isConfigKey } from "../../config.js";
import { InvalidConfigurationError } from "../../shared/errors.js";
import { parseGlobalOptions } from "../utils.js";

function requireKey(key: string) {
  if (!isConfigKey(key)) {
    throw new InvalidConfigurationError(
      `Unknown config key "${key}" (threshold, scan.intervalMs, scan.durationMs, discovery, log.level, report.dir)`
    );
  }
  return key;
}

export async function runConfigGet(key: string, raw: unknown): Promise<void> {
  const opts = parseGlobalOptions(raw);
  const value = await configGet(getDataDir(opts.dataDir), requireKey(key));
  if (value !== undefined) process.stdout.write(`${value}\n`);
}

export async function runConfigSet(key: string, value: string, raw: unknown): Promise<void> {
  const opts = parseGlobalOptions(raw);
  const configKey = requireKey(key);
  const next = await configSet(getDataDir(opts.dataDir), configKey, value);
  process.stdout.write(`${configKey} = ${String(next[configKey])}\n`);
}

export async function runConfigPath(raw: unknown): Promise<void> {
  const opts = parseGlobalOptions(raw);
  process.stdout.write(getConfigPath(getDataDir(opts.dataDir)) + "\n");
}
