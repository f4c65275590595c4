import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export interface LoggerOptions {
  /** Hide the device-specific half of MAC-like identifiers in every log line. */
  maskIds?: boolean;
}

const MAC_TAIL = /\b((?:[0-9A-Fa-f]{2}:){3})[0-9A-Fa-f]{2}:[0-9A-Fa-f]{2}:[0-9A-Fa-f]{2}\b/g;

export function maskIdentifiers(input: string): string {
  return input.replace(MAC_TAIL, (_match, head: string) => `${head}**:**:**`);
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isLogFormat(s: string): s is LogFormat {
  return LOG_FORMATS.some((format) => format === s);
}

function filteringStderr(filter: (line: string) => string): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(filter(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(filter: (line: string) => string): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o: unknown = JSON.parse(line);
          if (o && typeof o === "object" && "msg" in o && typeof o.msg === "string") {
            process.stderr.write(filter(o.msg) + "\n");
          }
        } catch {
          process.stderr.write(filter(line) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(
  level = "info",
  format = "text",
  options: LoggerOptions = {}
): void {
  const logLevel = isLogLevel(level) ? level : "info";
  const logFormat = isLogFormat(format) ? format : "text";
  const filter = options.maskIds ? maskIdentifiers : (s: string) => s;

  if (logFormat === "plain") {
    rootLogger = pino({ level: logLevel, name: "rollcall" }, plainMessageStderr(filter));
    return;
  }
  const dest = filteringStderr(filter);
  if (logFormat === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: dest });
    rootLogger = pino({ level: logLevel, name: "rollcall" }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: "rollcall" }, dest);
  }
}

function ensureLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: "info", name: "rollcall" }, plainMessageStderr((s) => s));
  }
  return rootLogger;
}

export function getLogger(): pino.Logger {
  return ensureLogger();
}

export const log = {
  info: (...args: Parameters<pino.Logger["info"]>) => ensureLogger().info(...args),
  warn: (...args: Parameters<pino.Logger["warn"]>) => ensureLogger().warn(...args),
  error: (...args: Parameters<pino.Logger["error"]>) => ensureLogger().error(...args),
  debug: (...args: Parameters<pino.Logger["debug"]>) => ensureLogger().debug(...args),
};
