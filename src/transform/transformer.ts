import { resolveBufferSize } from "../core/config.ts";
import type { EngineOptions } from "../rewrite/engine.ts";
import { RewriteEngine } from "../rewrite/engine.ts";
import type {
  Rewriter,
  SpanResult,
  SpanningTransformer,
  TransformResult,
} from "../rewrite/types.ts";
import type { DriveOptions } from "./drive.ts";
import { transformBytes, transformString } from "./drive.ts";

/**
 * TransformerOptions defines an exported structural contract.
 */
export interface TransformerOptions extends EngineOptions, DriveOptions {}

/**
 * Wraps a SpanningTransformer with helpers for whole strings and byte arrays.
 */
export class Transformer implements SpanningTransformer {
  readonly inner: SpanningTransformer;
  private readonly bufferSize: number;

  constructor(inner: SpanningTransformer, options: DriveOptions = {}) {
    this.inner = inner;
    this.bufferSize = resolveBufferSize(options.bufferSize);
  }

  transform(dst: Uint8Array, src: Uint8Array, atEOF: boolean): TransformResult {
    return this.inner.transform(dst, src, atEOF);
  }

  span(src: Uint8Array, atEOF: boolean): SpanResult {
    return this.inner.span(src, atEOF);
  }

  reset(): void {
    this.inner.reset();
  }

  /**
   * Rewrite text, returning the empty string if any error occurred.
   */
  string(text: string): string {
    const { output, err } = transformString(this.inner, text, { bufferSize: this.bufferSize });
    return err === null ? output : "";
  }

  /**
   * Rewrite bytes, returning null if any error occurred.
   */
  bytes(input: Uint8Array): Uint8Array | null {
    const { output, err } = transformBytes(this.inner, input, { bufferSize: this.bufferSize });
    return err === null ? output : null;
  }
}

/**
 * Create a Transformer that calls rewriter.rewrite until all input is processed or an error occurs.
 */
export function newTransformer(rewriter: Rewriter, options: TransformerOptions = {}): Transformer {
  const engineOptions: EngineOptions = options.logger ? { logger: options.logger } : {};
  return new Transformer(new RewriteEngine(rewriter, engineOptions), options);
}
