/**
 * Fixed-size, overlapping text windows.
 */

export interface TextWindow {
  start: number;
  end: number;
  text: string;
}

/**
 * Split text into windows of `size` characters, each starting `overlap`
 * characters before the previous one ended. Whitespace-only windows are
 * dropped; offsets refer to the untrimmed window.
 *
 * @throws RangeError if size < 1 or overlap is not in [0, size)
 */
export function chunkText(text: string, size: number, overlap: number): TextWindow[] {
  if (size < 1) {
    throw new RangeError(`Chunk size must be at least 1, got ${size}`);
  }
  if (overlap < 0 || overlap >= size) {
    throw new RangeError(`Chunk overlap must be in [0, ${size}), got ${overlap}`);
  }

  const windows: TextWindow[] = [];
  const n = text.length;
  let start = 0;

  while (start < n) {
    const end = Math.min(start + size, n);
    const chunk = text.slice(start, end).trim();
    if (chunk) {
      windows.push({ start, end, text: chunk });
    }
    if (end >= n) break;
    start = end - overlap;
  }

  return windows;
}
