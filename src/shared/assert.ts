import { type, type ArkErrors } from "arktype";
import { InvalidConfigurationError } from "./errors.js";

/** Unwrap an arktype validation result, throwing if validation failed. */
export function validated<T>(result: T | ArkErrors, context: string): T {
  if (result instanceof type.errors) {
    throw new InvalidConfigurationError(`Invalid ${context}: ${result.summary}`);
  }
  return result;
}
