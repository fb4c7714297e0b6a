/**
 * Keyword overlap scoring for memory retrieval.
 */

import type { MemoryRecord } from "./schema.js";

const WORD_RE = /[A-Za-z0-9_-]+/g;

/**
 * Lowercased alphanumeric tokens of at least two characters.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(WORD_RE)) {
    const token = match[0].toLowerCase();
    if (token.length >= 2) {
      tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Token set a record is matched on.
 */
export function recordTokens(record: MemoryRecord): Set<string> {
  return new Set(
    tokenize(
      [
        record.queryOriginal,
        record.queryCanonical,
        record.material ?? "",
        record.taskType ?? "",
        record.verdict,
      ].join(" ")
    )
  );
}

/**
 * Jaccard similarity |a ∩ b| / |a ∪ b|. Symmetric; 0 when both are empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }

  let intersection = 0;
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  for (const token of smaller) {
    if (larger.has(token)) {
      intersection++;
    }
  }

  return intersection / (a.size + b.size - intersection);
}
