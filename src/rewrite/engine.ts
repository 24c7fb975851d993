import { RewriteError, errShortSrc } from "../core/error.ts";
import type { Logger } from "../core/logger.ts";
import { defaultLogger } from "../core/logger.ts";
import type { CursorState } from "./state.ts";
import { SpanState, TransformState } from "./state.ts";
import type {
  Rewriter,
  SpanResult,
  SpanningTransformer,
  TransformResult,
} from "./types.ts";

/**
 * EngineOptions defines an exported structural contract.
 */
export interface EngineOptions {
  logger?: Logger;
}

type EngineMode = "transform" | "span";

function errorCode(err: Error): string {
  return err instanceof RewriteError ? err.code : err.name;
}

/**
 * Drives a Rewriter over UTF-8 input one segment at a time.
 *
 * After every call to Rewriter.rewrite that leaves no error, the cursor positions are
 * checkpointed. An invocation that stops on an error reports the last checkpoint, so the
 * reads and writes of the failing segment are never visible to the caller, who can resume
 * from there with more source or a drained destination.
 */
export class RewriteEngine implements SpanningTransformer {
  private readonly rewriter: Rewriter;
  private readonly logger: Logger;

  constructor(rewriter: Rewriter, options: EngineOptions = {}) {
    this.rewriter = rewriter;
    this.logger = options.logger ?? defaultLogger();
  }

  /**
   * Rewrite src into dst.
   * Units: bytes (UTF-8).
   */
  transform(dst: Uint8Array, src: Uint8Array, atEOF: boolean): TransformResult {
    return this.run(new TransformState(dst, src, atEOF), "transform");
  }

  /**
   * Length of the prefix of src that the Rewriter leaves unchanged, without writing output.
   * Units: bytes (UTF-8).
   */
  span(src: Uint8Array, atEOF: boolean): SpanResult {
    const { nSrc, err } = this.run(new SpanState(src, atEOF), "span");
    return { nSrc, err };
  }

  reset(): void {
    this.logger.debug("rewriter reset");
    this.rewriter.reset();
  }

  private run(state: CursorState, mode: EngineMode): TransformResult {
    let nDst = 0;
    let nSrc = 0;
    try {
      while (state.hasSource()) {
        if (state.needsMoreSource()) {
          return this.stop(mode, nDst, nSrc, errShortSrc);
        }
        state.beginSegment();
        this.rewriter.rewrite(state);
        const err = state.err ?? state.segmentError();
        if (err !== null) {
          return this.stop(mode, nDst, nSrc, err);
        }
        if (state.pSrc === nSrc) {
          throw new RewriteError("NO_PROGRESS", "Rewriter returned without consuming input", {
            offset: nSrc,
          });
        }
        nDst = state.pDst;
        nSrc = state.pSrc;
      }
      return { nDst, nSrc, err: null };
    } finally {
      state.release();
    }
  }

  private stop(mode: EngineMode, nDst: number, nSrc: number, err: Error): TransformResult {
    if (this.logger.isLevelEnabled("trace")) {
      this.logger.trace({ mode, nDst, nSrc, code: errorCode(err) }, "rewrite stopped at checkpoint");
    }
    return { nDst, nSrc, err };
  }
}
