import { rewriterFunc } from "../rewrite/rewriter.ts";
import type { Rewriter } from "../rewrite/types.ts";
import { RUNE_ERROR, RUNE_SELF } from "../utf8/utf8.ts";

const BACKSLASH = 0x5c;
const LOWER_U = 0x75;
const UPPER_U = 0x55;

function toHex(codePoint: number, width: number): string {
  return codePoint.toString(16).toUpperCase().padStart(width, "0");
}

function hexDigitValue(codePoint: number): number {
  if (codePoint >= 0x30 && codePoint <= 0x39) return codePoint - 0x30;
  if (codePoint >= 0x41 && codePoint <= 0x46) return codePoint - 0x41 + 10;
  if (codePoint >= 0x61 && codePoint <= 0x66) return codePoint - 0x61 + 10;
  return -1;
}

/**
 * Escapes non-ASCII code points as \uXXXX, or \UXXXXXXXX from U+FFFF up, and the
 * backslash itself as \\.
 */
export const escapeRewriter: Rewriter = rewriterFunc((state) => {
  const { codePoint } = state.readRune();
  if (codePoint >= 0xffff) {
    state.writeString(`\\U${toHex(codePoint, 8)}`);
  } else if (codePoint >= RUNE_SELF) {
    state.writeString(`\\u${toHex(codePoint, 4)}`);
  } else if (codePoint === BACKSLASH) {
    state.writeString("\\\\");
  } else {
    state.writeRune(codePoint);
  }
});

/**
 * Reverses escapeRewriter. A malformed escape is written as U+FFFD; a non-hex digit
 * inside it is pushed back and rewritten on its own.
 */
export const unescapeRewriter: Rewriter = rewriterFunc((state) => {
  const first = state.readRune().codePoint;
  if (first !== BACKSLASH) {
    state.writeRune(first);
    return;
  }
  const marker = state.readRune().codePoint;
  if (marker === BACKSLASH) {
    state.writeRune(BACKSLASH);
    return;
  }
  const digits = marker === LOWER_U ? 4 : marker === UPPER_U ? 8 : 0;
  if (digits === 0) {
    state.writeRune(RUNE_ERROR);
    return;
  }
  let value = 0;
  for (let index = 0; index < digits; index += 1) {
    const digit = hexDigitValue(state.readRune().codePoint);
    if (digit < 0) {
      state.unreadRune();
      state.writeRune(RUNE_ERROR);
      return;
    }
    value = value * 16 + digit;
  }
  state.writeRune(value);
});
