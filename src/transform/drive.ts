import { resolveBufferSize } from "../core/config.ts";
import { errShortDst } from "../core/error.ts";
import type { SpanningTransformer } from "../rewrite/types.ts";

/**
 * DriveOptions defines an exported structural contract.
 * Units: bytes (UTF-8).
 */
export interface DriveOptions {
  bufferSize?: number;
}

/**
 * BytesResult defines an exported structural contract.
 * Units: bytes (UTF-8).
 */
export interface BytesResult {
  output: Uint8Array;
  nSrc: number;
  err: Error | null;
}

/**
 * StringResult defines an exported structural contract.
 * Units: bytes (UTF-8) for nSrc.
 */
export interface StringResult {
  output: string;
  nSrc: number;
  err: Error | null;
}

/**
 * PumpResult defines an exported structural contract.
 */
export interface PumpResult {
  nSrc: number;
  err: Error | null;
  dst: Uint8Array;
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8");

/**
 * Concatenate byte chunks into one buffer.
 * Units: bytes (binary).
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  if (chunks.length === 1) return chunks[0] ?? new Uint8Array(0);
  let total = 0;
  for (const chunk of chunks) total += chunk.length;
  const output = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    output.set(chunk, offset);
    offset += chunk.length;
  }
  return output;
}

/**
 * Call t.transform until src is consumed or it stops for a reason other than a full destination.
 * Each call's output is copied to sink; dst is doubled whenever a call cannot make progress.
 * Returns the consumed source length and the destination buffer to reuse.
 * Units: bytes (UTF-8).
 */
export function pump(
  t: SpanningTransformer,
  src: Uint8Array,
  atEOF: boolean,
  dst: Uint8Array,
  sink: (chunk: Uint8Array) => void,
): PumpResult {
  let consumed = 0;
  let buffer = dst;
  for (;;) {
    const { nDst, nSrc, err } = t.transform(buffer, src.subarray(consumed), atEOF);
    if (nDst > 0) sink(buffer.slice(0, nDst));
    consumed += nSrc;
    if (err !== errShortDst) {
      return { nSrc: consumed, err, dst: buffer };
    }
    if (nDst === 0 && nSrc === 0) {
      buffer = new Uint8Array(Math.max(1, buffer.length * 2));
    }
  }
}

/**
 * Reset t and rewrite a complete byte sequence.
 * On error, output holds what was produced before the failing segment.
 * Units: bytes (UTF-8).
 */
export function transformBytes(
  t: SpanningTransformer,
  input: Uint8Array,
  options: DriveOptions = {},
): BytesResult {
  const bufferSize = resolveBufferSize(options.bufferSize);
  t.reset();
  const chunks: Uint8Array[] = [];
  const { nSrc, err } = pump(t, input, true, new Uint8Array(bufferSize), (chunk) => {
    chunks.push(chunk);
  });
  return { output: concatBytes(chunks), nSrc, err };
}

/**
 * Reset t and rewrite a complete string.
 * Units: bytes (UTF-8) for nSrc.
 */
export function transformString(
  t: SpanningTransformer,
  text: string,
  options: DriveOptions = {},
): StringResult {
  const { output, nSrc, err } = transformBytes(t, utf8Encoder.encode(text), options);
  return { output: utf8Decoder.decode(output), nSrc, err };
}
