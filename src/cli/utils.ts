import { readFileSync, existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { type } from "arktype";
import { validated } from "../shared/assert.js";
import { InvalidConfigurationError } from "../shared/errors.js";
import { initLogger } from "../shared/logging.js";

/** Options every command accepts (declared on the root program). */
export const GlobalOptions = type({
  "dataDir?": "string",
  "logLevel?": "string",
  "logFormat?": "string",
  "verbose?": "boolean",
  "maskIds?": "boolean",
});

export type GlobalOptions = typeof GlobalOptions.infer;

export function parseGlobalOptions(raw: unknown): GlobalOptions {
  return validated(GlobalOptions(raw), "options");
}

export function setupLogging(opts: GlobalOptions, defaultLevel = "info"): void {
  initLogger(opts.verbose ? "debug" : (opts.logLevel ?? defaultLevel), opts.logFormat ?? "text", {
    maskIds: opts.maskIds === true,
  });
}

export function parsePositiveInt(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidConfigurationError(`${label} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function getPackageJsonVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 4; i++) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(candidate, "utf8"));
        const version =
          pkg && typeof pkg === "object" && "version" in pkg ? pkg.version : undefined;
        if (typeof version === "string") return version;
      } catch {
        break;
      }
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}
