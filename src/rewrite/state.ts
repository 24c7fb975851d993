import { RewriteError, errEndOfSpan, errShortDst, errShortSrc } from "../core/error.ts";
import type { DecodedRune } from "../utf8/utf8.ts";
import { RUNE_ERROR, UTF_MAX, decodeRune, encodeRune, fullRune } from "../utf8/utf8.ts";
import type { State } from "./types.ts";

const utf8Encoder = new TextEncoder();

/**
 * Read and write cursors over one source buffer, shared by the transform and span engines.
 * Subclasses only decide what committing a write means.
 * Units: bytes (UTF-8).
 */
export abstract class CursorState implements State {
  pSrc = 0;
  pDst = 0;
  err: Error | null = null;

  protected readonly src: Uint8Array;
  private readonly atEOF: boolean;
  private readonly scratch = new Uint8Array(UTF_MAX);
  // Width of the last read in the current segment; null before the first read or after an unread.
  private lastSize: number | null = null;
  private unread = false;
  private released = false;

  constructor(src: Uint8Array, atEOF: boolean) {
    this.src = src;
    this.atEOF = atEOF;
  }

  /** Bytes committed by a write must land exactly at pDst. */
  protected abstract commit(bytes: Uint8Array): boolean;

  /**
   * Reset the per-segment unread bookkeeping before a Rewriter call.
   */
  beginSegment(): void {
    this.lastSize = null;
    this.unread = false;
  }

  /**
   * Whether the unread source is a partial encoding that more input could complete.
   */
  needsMoreSource(): boolean {
    return !this.atEOF && !fullRune(this.src, this.pSrc, this.src.length);
  }

  /**
   * Error ending an otherwise clean segment; null when the segment can be checkpointed.
   */
  segmentError(): Error | null {
    return null;
  }

  hasSource(): boolean {
    return this.pSrc < this.src.length;
  }

  /**
   * Invalidate the state once the engine invocation that owns it returns.
   */
  release(): void {
    this.released = true;
  }

  readRune(): DecodedRune {
    this.assertLive("readRune");
    this.unread = false;
    const decoded = decodeRune(this.src, this.pSrc, this.src.length);
    if (decoded.codePoint === RUNE_ERROR && decoded.size <= 1 && this.needsMoreSource()) {
      this.setError(errShortSrc);
      this.lastSize = 0;
      return { codePoint: RUNE_ERROR, size: 0 };
    }
    this.pSrc += decoded.size;
    this.lastSize = decoded.size;
    return decoded;
  }

  unreadRune(): void {
    this.assertLive("unreadRune");
    if (this.unread) {
      throw new RewriteError("UNREAD_TWICE", "unreadRune called twice without a read in between");
    }
    if (this.lastSize === null) {
      throw new RewriteError("UNREAD_WITHOUT_READ", "unreadRune called without any prior read");
    }
    this.pSrc -= this.lastSize;
    this.lastSize = null;
    this.unread = true;
  }

  writeBytes(bytes: Uint8Array): boolean {
    this.assertLive("writeBytes");
    return this.commit(bytes);
  }

  writeString(text: string): boolean {
    this.assertLive("writeString");
    return this.commit(utf8Encoder.encode(text));
  }

  writeRune(codePoint: number): boolean {
    this.assertLive("writeRune");
    const size = encodeRune(codePoint, this.scratch, 0);
    return this.commit(this.scratch.subarray(0, size));
  }

  setError(err: Error): void {
    this.assertLive("setError");
    if (this.err === null) this.err = err;
  }

  private assertLive(operation: string): void {
    if (this.released) {
      throw new RewriteError("STATE_RELEASED", "State used after its invocation returned", {
        operation,
      });
    }
  }
}

/**
 * State that copies writes into a destination buffer.
 */
export class TransformState extends CursorState {
  private readonly dst: Uint8Array;

  constructor(dst: Uint8Array, src: Uint8Array, atEOF: boolean) {
    super(src, atEOF);
    this.dst = dst;
  }

  protected override commit(bytes: Uint8Array): boolean {
    if (bytes.length > this.dst.length - this.pDst) {
      this.setError(errShortDst);
      return false;
    }
    this.dst.set(bytes, this.pDst);
    this.pDst += bytes.length;
    return true;
  }
}

/**
 * State without a destination: writes are compared against the source at the same offset.
 */
export class SpanState extends CursorState {
  // Output that no longer lines up with the input ends the span even if every byte matched.
  override segmentError(): Error | null {
    return this.pDst === this.pSrc ? null : errEndOfSpan;
  }

  protected override commit(bytes: Uint8Array): boolean {
    for (let index = 0; index < bytes.length; index += 1) {
      const offset = this.pDst + index;
      if (offset >= this.src.length || this.src[offset] !== bytes[index]) {
        this.pDst = offset;
        this.setError(errEndOfSpan);
        return false;
      }
    }
    this.pDst += bytes.length;
    return true;
  }
}
