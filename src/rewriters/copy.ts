import { rewriterFunc } from "../rewrite/rewriter.ts";
import type { Rewriter } from "../rewrite/types.ts";

/**
 * Writes every code point back unchanged. Invalid bytes come out as U+FFFD.
 */
export const copyRewriter: Rewriter = rewriterFunc((state) => {
  const { codePoint } = state.readRune();
  state.writeRune(codePoint);
});
