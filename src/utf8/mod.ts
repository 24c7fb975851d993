export type { DecodedRune } from "./utf8.ts";
export {
  MAX_RUNE,
  RUNE_ERROR,
  RUNE_SELF,
  UTF_MAX,
  decodeRune,
  encodeRune,
  fullRune,
  isValidRune,
  runeLen,
} from "./utf8.ts";
