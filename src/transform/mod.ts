export type { BytesResult, DriveOptions, PumpResult, StringResult } from "./drive.ts";
export { concatBytes, pump, transformBytes, transformString } from "./drive.ts";
export { createRewriteStream } from "./stream.ts";
export type { TransformerOptions } from "./transformer.ts";
export { Transformer, newTransformer } from "./transformer.ts";
