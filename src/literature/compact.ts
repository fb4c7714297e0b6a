/**
 * Compact literature documents into prompt text.
 *
 * Each document becomes one unit; units are the granularity at which the
 * literature context is truncated.
 */

import type { LiteratureDocument } from "./types.js";

export const LITERATURE_UNIT_SEPARATOR = "\n";

export function toLiteratureUnit(doc: LiteratureDocument): string {
  return `TITLE: ${doc.title}\nID: ${doc.id}\nSUMMARY:\n${doc.summary}\n---`;
}

export function toLiteratureUnits(docs: readonly LiteratureDocument[]): string[] {
  return docs.map(toLiteratureUnit);
}

/**
 * Clip a search query to `maxChars`, preferring a word boundary.
 */
export function clipQuery(query: string, maxChars: number): string {
  const trimmed = query.trim();
  if (trimmed.length <= maxChars) {
    return trimmed;
  }

  const cut = trimmed.slice(0, maxChars);
  if (/\s/.test(trimmed.charAt(maxChars))) {
    return cut.trim();
  }
  const lastSpace = cut.lastIndexOf(" ");
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trim();
}
