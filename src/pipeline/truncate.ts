/**
 * Context truncation.
 *
 * Prompt contexts are bounded by character caps. Truncation works on whole
 * units (a literature document, a retrieved passage) and drops from the
 * tail, so what survives is always a prefix of the ranked input.
 */

import type { RetrievalChunk } from "../retrieval/types.js";
import { formatPassage } from "../retrieval/retriever.js";

export interface TruncatedUnits {
  text: string;
  kept: number;
  dropped: number;
}

/**
 * Join units with `separator`, dropping whole trailing units until the
 * result fits `maxChars`. When not even the first unit fits, it is cut
 * at `maxChars`.
 */
export function truncateUnits(
  units: readonly string[],
  maxChars: number,
  separator = "\n"
): TruncatedUnits {
  if (units.length === 0 || maxChars <= 0) {
    return { text: "", kept: 0, dropped: units.length };
  }

  let length = 0;
  let kept = 0;
  for (const unit of units) {
    const added = kept === 0 ? unit.length : unit.length + separator.length;
    if (length + added > maxChars) break;
    length += added;
    kept++;
  }

  if (kept === 0) {
    return { text: units[0].slice(0, maxChars), kept: 1, dropped: units.length - 1 };
  }

  return {
    text: units.slice(0, kept).join(separator),
    kept,
    dropped: units.length - kept,
  };
}

export const PASSAGE_SEPARATOR = "\n\n";

/**
 * Keep ranked passages best-first while their rendered text fits
 * `maxChars`. A lone passage longer than the cap has its text shortened.
 */
export function truncatePassages(
  chunks: readonly RetrievalChunk[],
  maxChars: number
): RetrievalChunk[] {
  if (chunks.length === 0 || maxChars <= 0) {
    return [];
  }

  const kept: RetrievalChunk[] = [];
  let length = 0;
  for (const chunk of chunks) {
    const rendered = formatPassage(chunk).length;
    const added = kept.length === 0 ? rendered : rendered + PASSAGE_SEPARATOR.length;
    if (length + added > maxChars) break;
    kept.push(chunk);
    length += added;
  }

  if (kept.length > 0) {
    return kept;
  }

  const first = chunks[0];
  const overhead = formatPassage({ ...first, text: "" }).length;
  const room = maxChars - overhead;
  if (room <= 0) {
    return [];
  }
  return [{ ...first, text: first.text.slice(0, room), end: first.start + room }];
}
