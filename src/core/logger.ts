import pino from "pino";
import type { Logger } from "pino";
import { IMPLEMENTATION_ID, LOG_LEVEL_ENV, getEnv } from "./config.ts";

export type { Logger } from "pino";

/**
 * LoggerOptions defines an exported structural contract.
 */
export interface LoggerOptions {
  level?: string;
  name?: string;
}

function isKnownLevel(level: string): boolean {
  return level === "silent" || Object.hasOwn(pino.levels.values, level);
}

/**
 * Create the library logger. Silent unless a level is passed or TEXTREWRITE_LOG_LEVEL is set.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const requested = options.level ?? getEnv(LOG_LEVEL_ENV) ?? "silent";
  return pino({
    name: options.name ?? IMPLEMENTATION_ID,
    level: isKnownLevel(requested) ? requested : "silent",
  });
}

let sharedLogger: Logger | null = null;

/**
 * Logger shared by engines created without an explicit logger.
 */
export function defaultLogger(): Logger {
  if (!sharedLogger) sharedLogger = createLogger();
  return sharedLogger;
}
