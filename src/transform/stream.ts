import { resolveBufferSize } from "../core/config.ts";
import { errShortSrc } from "../core/error.ts";
import type { SpanningTransformer } from "../rewrite/types.ts";
import type { DriveOptions } from "./drive.ts";
import { concatBytes, pump } from "./drive.ts";

/**
 * Rewrite a byte stream with t.
 *
 * Source bytes the transformer cannot consume yet (a partial encoding, or a segment that
 * needs more lookahead) are kept and retried with the next chunk. The final flush runs at
 * end of input, where a short source errors the stream like any other error.
 * Units: bytes (UTF-8).
 */
export function createRewriteStream(
  t: SpanningTransformer,
  options: DriveOptions = {},
): TransformStream<Uint8Array, Uint8Array> {
  let dst: Uint8Array = new Uint8Array(resolveBufferSize(options.bufferSize));
  let pending: Uint8Array = new Uint8Array(0);

  const run = (controller: TransformStreamDefaultController<Uint8Array>, atEOF: boolean) => {
    const result = pump(t, pending, atEOF, dst, (chunk) => controller.enqueue(chunk));
    dst = result.dst;
    pending = pending.slice(result.nSrc);
    if (result.err !== null && (atEOF || result.err !== errShortSrc)) {
      throw result.err;
    }
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    start() {
      t.reset();
    },
    transform(chunk, controller) {
      pending = pending.length === 0 ? chunk : concatBytes([pending, chunk]);
      run(controller, false);
    },
    flush(controller) {
      run(controller, true);
    },
  });
}
