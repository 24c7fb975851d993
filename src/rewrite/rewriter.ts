import type { Rewriter, State } from "./types.ts";

/**
 * RewriteFunction defines an exported type contract.
 */
export type RewriteFunction = (state: State) => void;

/**
 * Adapt a plain function into a stateless Rewriter whose reset does nothing.
 */
export function rewriterFunc(fn: RewriteFunction): Rewriter {
  return {
    rewrite: fn,
    reset: () => {},
  };
}
