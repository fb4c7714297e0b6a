/**
 * Lexical relevance scoring for local passages.
 */

const WORD_RE = /\w+/g;

/**
 * Lowercased word tokens.
 */
export function tokenizeWords(text: string): string[] {
  return Array.from(text.toLowerCase().matchAll(WORD_RE), (m) => m[0]);
}

/**
 * Fraction of distinct query tokens that occur in the chunk, in [0, 1].
 */
export function scoreChunk(queryTokens: ReadonlySet<string>, chunkTokens: ReadonlySet<string>): number {
  if (queryTokens.size === 0 || chunkTokens.size === 0) {
    return 0;
  }

  let matches = 0;
  for (const token of queryTokens) {
    if (chunkTokens.has(token)) {
      matches++;
    }
  }

  return matches / queryTokens.size;
}
