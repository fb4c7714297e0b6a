/**
 * Context truncation tests.
 *
 * Run: node --import tsx src/pipeline/truncate.test.ts
 */

import { strict as assert } from "node:assert";

import { truncatePassages, truncateUnits } from "./truncate.js";
import { formatPassages } from "../retrieval/retriever.js";
import type { RetrievalChunk } from "../retrieval/types.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function chunk(source: string, text: string, order: number): RetrievalChunk {
  return {
    source,
    page: null,
    start: 0,
    end: text.length,
    text,
    score: 1,
    documentOrder: order,
    chunkOrder: 0,
  };
}

section("truncateUnits");

const UNITS = ["aaaa", "bbbb", "cccc"];

test("everything fits", () => {
  assert.deepEqual(truncateUnits(UNITS, 14), { text: "aaaa\nbbbb\ncccc", kept: 3, dropped: 0 });
});

test("whole trailing units are dropped", () => {
  assert.deepEqual(truncateUnits(UNITS, 13), { text: "aaaa\nbbbb", kept: 2, dropped: 1 });
  assert.deepEqual(truncateUnits(UNITS, 8), { text: "aaaa", kept: 1, dropped: 2 });
});

test("result is a prefix of the untruncated text", () => {
  const full = UNITS.join("\n");
  for (let cap = 1; cap <= full.length; cap++) {
    const { text } = truncateUnits(UNITS, cap);
    assert.ok(full.startsWith(text), `cap ${cap}`);
    assert.ok(text.length <= cap, `cap ${cap}`);
  }
});

test("an oversized first unit is cut at the cap", () => {
  assert.deepEqual(truncateUnits(UNITS, 3), { text: "aaa", kept: 1, dropped: 2 });
});

test("custom separators count toward the cap", () => {
  assert.deepEqual(truncateUnits(UNITS, 12, "\n---\n"), { text: "aaaa", kept: 1, dropped: 2 });
  assert.deepEqual(truncateUnits(UNITS, 13, "\n---\n"), { text: "aaaa\n---\nbbbb", kept: 2, dropped: 1 });
});

test("empty input and zero cap yield nothing", () => {
  assert.deepEqual(truncateUnits([], 100), { text: "", kept: 0, dropped: 0 });
  assert.deepEqual(truncateUnits(UNITS, 0), { text: "", kept: 0, dropped: 3 });
});

section("truncatePassages");

// "[a.txt] xxxxxxxxxx" renders to 18 characters; passages are joined by a blank line.
const PASSAGES = [chunk("a.txt", "x".repeat(10), 0), chunk("b.txt", "y".repeat(10), 1)];

test("passages are kept best-first while they fit", () => {
  assert.equal(truncatePassages(PASSAGES, 38).length, 2);
  assert.deepEqual(truncatePassages(PASSAGES, 37), [PASSAGES[0]]);
  assert.ok(formatPassages(truncatePassages(PASSAGES, 38)).length <= 38);
});

test("a lone oversized passage is shortened", () => {
  const [only] = truncatePassages(PASSAGES, 12);
  assert.equal(only.text, "xxxx");
  assert.equal(only.end, 4);
  assert.equal(formatPassages([only]), "[a.txt] xxxx");
});

test("no room for the label means no passages", () => {
  assert.deepEqual(truncatePassages(PASSAGES, 8), []);
  assert.deepEqual(truncatePassages([], 100), []);
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
