export type { RewriteErrorCode } from "../core/error.ts";
export {
  RewriteError,
  errEndOfSpan,
  errShortDst,
  errShortSrc,
  isRewriteError,
} from "../core/error.ts";
export {
  DEFAULT_BUFFER_SIZE,
  IMPLEMENTATION_ID,
  LIBRARY_VERSION,
  LOG_LEVEL_ENV,
} from "../core/config.ts";
export type { Logger, LoggerOptions } from "../core/logger.ts";
export { createLogger } from "../core/logger.ts";
export * from "../utf8/mod.ts";
export * from "../rewrite/mod.ts";
export * from "../transform/mod.ts";
export * from "../rewriters/mod.ts";
export { isWhiteSpace } from "../unicode/white-space.ts";
