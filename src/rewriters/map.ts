import { rewriterFunc } from "../rewrite/rewriter.ts";
import type { Rewriter } from "../rewrite/types.ts";

/**
 * CodePointMapper defines an exported type contract.
 * Units: Unicode scalar values.
 */
export type CodePointMapper = (codePoint: number) => number;

/**
 * Rewrite one code point at a time through mapper.
 * Units: Unicode scalar values.
 */
export function mapRewriter(mapper: CodePointMapper): Rewriter {
  return rewriterFunc((state) => {
    const { codePoint } = state.readRune();
    state.writeRune(mapper(codePoint));
  });
}

/**
 * Replace every code point, valid or not, with filler.
 * Units: Unicode scalar values.
 */
export function replaceAllRewriter(filler: number): Rewriter {
  return mapRewriter(() => filler);
}
