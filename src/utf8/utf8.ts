/**
 * Replacement character returned for undecodable input.
 * Units: Unicode scalar values.
 */
export const RUNE_ERROR = 0xfffd;

/**
 * Code points below RUNE_SELF are encoded as a single byte.
 */
export const RUNE_SELF = 0x80;

/**
 * Largest Unicode code point.
 */
export const MAX_RUNE = 0x10ffff;

/**
 * Maximum number of bytes of a UTF-8 encoded code point.
 */
export const UTF_MAX = 4;

/**
 * DecodedRune defines an exported structural contract.
 */
export interface DecodedRune {
  codePoint: number;
  size: number;
}

interface LeadInfo {
  size: number;
  lo: number;
  hi: number;
}

const CONT_LO = 0x80;
const CONT_HI = 0xbf;

// Accepted ranges for the second byte, keyed by the leading byte.
function leadInfo(lead: number): LeadInfo | null {
  if (lead < 0xc2) return null;
  if (lead <= 0xdf) return { size: 2, lo: CONT_LO, hi: CONT_HI };
  if (lead === 0xe0) return { size: 3, lo: 0xa0, hi: CONT_HI };
  if (lead === 0xed) return { size: 3, lo: CONT_LO, hi: 0x9f };
  if (lead <= 0xef) return { size: 3, lo: CONT_LO, hi: CONT_HI };
  if (lead === 0xf0) return { size: 4, lo: 0x90, hi: CONT_HI };
  if (lead <= 0xf3) return { size: 4, lo: CONT_LO, hi: CONT_HI };
  if (lead === 0xf4) return { size: 4, lo: CONT_LO, hi: 0x8f };
  return null;
}

function isContinuation(byte: number): boolean {
  return byte >= CONT_LO && byte <= CONT_HI;
}

/**
 * Whether a number is a Unicode scalar value.
 * Units: Unicode scalar values.
 */
export function isValidRune(codePoint: number): boolean {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > MAX_RUNE) return false;
  return codePoint < 0xd800 || codePoint > 0xdfff;
}

/**
 * Number of bytes needed to encode a code point, or -1 if it is not a scalar value.
 * Units: bytes (UTF-8).
 */
export function runeLen(codePoint: number): number {
  if (!isValidRune(codePoint)) return -1;
  if (codePoint < RUNE_SELF) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Decode the first code point of bytes[start, end).
 * Returns (RUNE_ERROR, 0) for empty input and (RUNE_ERROR, 1) for invalid or incomplete input.
 * Units: bytes (UTF-8).
 */
export function decodeRune(bytes: Uint8Array, start = 0, end = bytes.length): DecodedRune {
  const available = end - start;
  if (available <= 0) return { codePoint: RUNE_ERROR, size: 0 };
  const byte0 = bytes[start] ?? 0;
  if (byte0 < RUNE_SELF) return { codePoint: byte0, size: 1 };

  const info = leadInfo(byte0);
  if (!info || available < info.size) return { codePoint: RUNE_ERROR, size: 1 };

  const byte1 = bytes[start + 1] ?? 0;
  if (byte1 < info.lo || byte1 > info.hi) return { codePoint: RUNE_ERROR, size: 1 };
  if (info.size === 2) {
    return { codePoint: ((byte0 & 0x1f) << 6) | (byte1 & 0x3f), size: 2 };
  }

  const byte2 = bytes[start + 2] ?? 0;
  if (!isContinuation(byte2)) return { codePoint: RUNE_ERROR, size: 1 };
  if (info.size === 3) {
    return {
      codePoint: ((byte0 & 0x0f) << 12) | ((byte1 & 0x3f) << 6) | (byte2 & 0x3f),
      size: 3,
    };
  }

  const byte3 = bytes[start + 3] ?? 0;
  if (!isContinuation(byte3)) return { codePoint: RUNE_ERROR, size: 1 };
  return {
    codePoint:
      ((byte0 & 0x07) << 18) | ((byte1 & 0x3f) << 12) | ((byte2 & 0x3f) << 6) | (byte3 & 0x3f),
    size: 4,
  };
}

/**
 * Whether bytes[start, end) begins with a full encoding.
 * Invalid sequences count as full since they decode to (RUNE_ERROR, 1).
 * Units: bytes (UTF-8).
 */
export function fullRune(bytes: Uint8Array, start = 0, end = bytes.length): boolean {
  const available = end - start;
  if (available <= 0) return false;
  const byte0 = bytes[start] ?? 0;
  if (byte0 < RUNE_SELF) return true;
  const info = leadInfo(byte0);
  if (!info || available >= info.size) return true;
  const byte1 = bytes[start + 1] ?? 0;
  if (available > 1 && (byte1 < info.lo || byte1 > info.hi)) return true;
  if (available > 2 && !isContinuation(bytes[start + 2] ?? 0)) return true;
  return false;
}

/**
 * Write the encoding of a code point into out at offset; invalid values encode RUNE_ERROR.
 * The caller provides at least UTF_MAX bytes of room. Returns the number of bytes written.
 * Units: bytes (UTF-8).
 */
export function encodeRune(codePoint: number, out: Uint8Array, offset = 0): number {
  const value = isValidRune(codePoint) ? codePoint : RUNE_ERROR;
  const size = runeLen(value);
  switch (size) {
    case 1:
      out[offset] = value;
      break;
    case 2:
      out[offset] = 0xc0 | (value >> 6);
      out[offset + 1] = 0x80 | (value & 0x3f);
      break;
    case 3:
      out[offset] = 0xe0 | (value >> 12);
      out[offset + 1] = 0x80 | ((value >> 6) & 0x3f);
      out[offset + 2] = 0x80 | (value & 0x3f);
      break;
    default:
      out[offset] = 0xf0 | (value >> 18);
      out[offset + 1] = 0x80 | ((value >> 12) & 0x3f);
      out[offset + 2] = 0x80 | ((value >> 6) & 0x3f);
      out[offset + 3] = 0x80 | (value & 0x3f);
  }
  return size;
}
