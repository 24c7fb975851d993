// White_Space=Yes ranges as (start, end) pairs, sorted.
const WHITE_SPACE_RANGES = new Int32Array([
  0x0009, 0x000d, 0x0020, 0x0020, 0x0085, 0x0085, 0x00a0, 0x00a0, 0x1680, 0x1680, 0x2000, 0x200a,
  0x2028, 0x2029, 0x202f, 0x202f, 0x205f, 0x205f, 0x3000, 0x3000,
]);

/**
 * Whether a Unicode scalar value has the White_Space property.
 * Units: Unicode scalar values.
 */
export function isWhiteSpace(codePoint: number): boolean {
  if (codePoint <= 0x20) return codePoint === 0x20 || (codePoint >= 0x09 && codePoint <= 0x0d);
  let lo = 0;
  let hi = WHITE_SPACE_RANGES.length / 2 - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const start = WHITE_SPACE_RANGES[mid * 2] ?? 0;
    const end = WHITE_SPACE_RANGES[mid * 2 + 1] ?? 0;
    if (codePoint < start) {
      hi = mid - 1;
    } else if (codePoint > end) {
      lo = mid + 1;
    } else {
      return true;
    }
  }
  return false;
}
