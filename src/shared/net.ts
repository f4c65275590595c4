import { DEFAULT_HOST, DEFAULT_PORT } from "./constants.js";
import { InvalidConfigurationError } from "./errors.js";

export interface ListenAddress {
  host: string;
  port: number;
}

const HOST_PORT = /^(?:\[(?<ipv6>[^\]]+)\]|(?<host>[^:[\]]*)):(?<port>[^:]*)$/;

function toPort(raw: string, listen: string): number {
  const port = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidConfigurationError(`Invalid port in listen address "${listen}": must be 1-65535`);
  }
  return port;
}

/**
 * Parses a `--listen` value: "4870", "0.0.0.0:4870", ":4870" or "[::1]:4870".
 * An empty value gives the default address.
 */
export function parseListen(listen: string): ListenAddress {
  const value = listen.trim();
  if (value === "") return { host: DEFAULT_HOST, port: DEFAULT_PORT };
  if (/^\d+$/.test(value)) return { host: DEFAULT_HOST, port: toPort(value, listen) };

  const groups = HOST_PORT.exec(value)?.groups;
  if (!groups) {
    throw new InvalidConfigurationError(`Invalid listen address "${listen}": expected [host:]port`);
  }
  const host = groups.ipv6 ?? groups.host?.trim();
  return { host: host || DEFAULT_HOST, port: toPort(groups.port ?? "", listen) };
}
