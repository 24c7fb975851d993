export { CleanSpacesRewriter } from "./clean-spaces.ts";
export { copyRewriter } from "./copy.ts";
export { escapeRewriter, unescapeRewriter } from "./escape.ts";
export type { CodePointMapper } from "./map.ts";
export { mapRewriter, replaceAllRewriter } from "./map.ts";
