import { RewriteError } from "./error.ts";

/**
 * LIBRARY_VERSION is an exported constant used by public APIs.
 */
export const LIBRARY_VERSION = "0.1.0" as const;

/**
 * Name reported in log records.
 */
export const IMPLEMENTATION_ID: string = `textrewrite@${LIBRARY_VERSION}`;

/**
 * Initial destination size used by the buffer drivers.
 * Units: bytes (UTF-8).
 */
export const DEFAULT_BUFFER_SIZE = 4096;

/**
 * Environment variable that sets the level of the default logger.
 */
export const LOG_LEVEL_ENV = "TEXTREWRITE_LOG_LEVEL";

/**
 * Read an environment variable without assuming a Node.js host.
 */
export function getEnv(name: string): string | undefined {
  if (typeof process === "undefined") return undefined;
  const value = process.env[name];
  return value === "" ? undefined : value;
}

/**
 * Validate a destination size option, falling back to DEFAULT_BUFFER_SIZE.
 * Units: bytes (UTF-8).
 */
export function resolveBufferSize(value: number | undefined): number {
  if (value === undefined) return DEFAULT_BUFFER_SIZE;
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RewriteError("INVALID_OPTION", "bufferSize must be a positive integer", {
      bufferSize: value,
    });
  }
  return value;
}
