import type { DecodedRune } from "../utf8/utf8.ts";

/**
 * State gives a Rewriter access to one indivisible segment of input and output.
 * Reads and writes made during a call to Rewriter.rewrite are committed in full or not at all.
 * A State is only valid for the duration of the engine invocation that created it.
 */
export interface State {
  /**
   * Decode the next code point. Returns (RUNE_ERROR, 1) for invalid UTF-8 and
   * (RUNE_ERROR, 0) when the source is exhausted or ends in a partial encoding.
   */
  readRune(): DecodedRune;

  /**
   * Make the most recently read code point available to the next read.
   * Allowed once per read; a no-op if that read consumed nothing.
   */
  unreadRune(): void;

  /** Write raw bytes, reporting whether the write succeeded. */
  writeBytes(bytes: Uint8Array): boolean;

  /** Write the UTF-8 encoding of a string, reporting whether the write succeeded. */
  writeString(text: string): boolean;

  /** Write the UTF-8 encoding of a code point, reporting whether the write succeeded. */
  writeRune(codePoint: number): boolean;

  /** Report invalid input. Only the first error of an invocation is kept. */
  setError(err: Error): void;
}

/**
 * Rewriter defines an exported structural contract.
 */
export interface Rewriter {
  /**
   * Rewrite an indivisible segment of input. If any error is set, all reads and writes
   * made within the same call are discarded. Never called with empty input.
   */
  rewrite(state: State): void;

  /** Clear any state carried over from previous calls. */
  reset(): void;
}

/**
 * TransformResult defines an exported structural contract.
 * Units: bytes (UTF-8).
 */
export interface TransformResult {
  nDst: number;
  nSrc: number;
  err: Error | null;
}

/**
 * SpanResult defines an exported structural contract.
 * Units: bytes (UTF-8).
 */
export interface SpanResult {
  nSrc: number;
  err: Error | null;
}

/**
 * A byte transformer that can also report how much of its input it would leave unchanged.
 */
export interface SpanningTransformer {
  transform(dst: Uint8Array, src: Uint8Array, atEOF: boolean): TransformResult;
  span(src: Uint8Array, atEOF: boolean): SpanResult;
  reset(): void;
}
