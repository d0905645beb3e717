/**
 * Extracts the substring addressed by a platform entity.
 *
 * Offsets and lengths are UTF-16 code units: code points above U+FFFF count
 * as 2, everything else as 1. An offset that lands inside a surrogate pair
 * snaps forward to the next code point. Negative offsets, non-positive
 * lengths and ranges running past the end of the text yield `''`.
 */
export function extractSubstring(text: string, offset: number, length: number): string {
  if (offset < 0 || length <= 0) return '';

  const end = offset + length;
  let pos = 0;
  let start = -1;

  for (const ch of text) {
    if (start < 0 && pos >= offset) start = pos;
    pos += ch.length;
    if (pos >= end) return start < 0 ? '' : text.slice(start, pos);
  }

  return '';
}
