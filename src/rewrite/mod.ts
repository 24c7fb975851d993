export type {
  Rewriter,
  SpanResult,
  SpanningTransformer,
  State,
  TransformResult,
} from "./types.ts";
export type { EngineOptions } from "./engine.ts";
export { RewriteEngine } from "./engine.ts";
export type { RewriteFunction } from "./rewriter.ts";
export { rewriterFunc } from "./rewriter.ts";
