/**
 * RewriteErrorCode defines an exported type contract.
 */
export type RewriteErrorCode =
  | "SHORT_SRC"
  | "SHORT_DST"
  | "END_OF_SPAN"
  | "UNREAD_WITHOUT_READ"
  | "UNREAD_TWICE"
  | "NO_PROGRESS"
  | "STATE_RELEASED"
  | "INVALID_OPTION";

/**
 * RewriteError provides an exported class contract.
 */
export class RewriteError extends Error {
  readonly code: RewriteErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: RewriteErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "RewriteError";
    this.code = code;
    if (details) this.details = details;
  }
}

/**
 * Returned when the source ends in the middle of an encoding and more bytes may follow.
 */
export const errShortSrc: RewriteError = new RewriteError(
  "SHORT_SRC",
  "rewrite: short source buffer",
);

/**
 * Returned when the destination cannot hold the output of the next segment.
 */
export const errShortDst: RewriteError = new RewriteError(
  "SHORT_DST",
  "rewrite: short destination buffer",
);

/**
 * Returned by span when the rewritten output stops matching the input.
 */
export const errEndOfSpan: RewriteError = new RewriteError(
  "END_OF_SPAN",
  "rewrite: input and output are not identical",
);

/**
 * isRewriteError executes a deterministic operation in this module.
 */
export function isRewriteError(value: unknown, code?: RewriteErrorCode): value is RewriteError {
  if (!(value instanceof RewriteError)) return false;
  return code === undefined || value.code === code;
}
