import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
  DISCOVERY_FAILURE: 4,
  STATE_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** Threshold, interval or registry rejected when a session is started. No session is created. */
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

/** Operation not allowed in the tracker's current state. Nothing was mutated. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/** The selected discovery backend cannot be used on this host (e.g. no BLE adapter). */
export class DiscoveryUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DiscoveryUnavailableError";
  }
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof InvalidConfigurationError || error instanceof RegistryError) {
    return EXIT.INVALID_ARGS;
  }
  if (error instanceof InvalidStateError) return EXIT.STATE_ERROR;
  if (error instanceof DiscoveryUnavailableError) return EXIT.DISCOVERY_FAILURE;
  const message = error instanceof Error ? error.message : String(error);
  if (message.includes("invalid") || message.includes("Unknown option") || message.includes("Invalid")) {
    return EXIT.INVALID_ARGS;
  }
  return EXIT.GENERIC_ERROR;
}
