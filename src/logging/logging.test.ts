/**
 * Logging tests.
 *
 * Run: node --import tsx src/logging/logging.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { createLogger, formatLogEntry, isLogLevel, silentLogger } from "./logger.js";
import { generateRunId, isRunId } from "./run-id.js";

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

const NOW = new Date("2025-03-07T08:09:10.000Z");

section("Run IDs");

test("run id carries the prefix, UTC date and UTC time", () => {
  const id = generateRunId("mof", NOW);
  assert.match(id, /^mof-20250307-080910000-[a-f0-9]{12}$/);
  assert.ok(isRunId(id));
});

test("run ids generated at the same instant do not collide", () => {
  const ids = new Set(Array.from({ length: 20_000 }, () => generateRunId(undefined, NOW)));
  assert.equal(ids.size, 20_000);
});

test("isRunId rejects other shapes", () => {
  assert.equal(isRunId("mof-20250307-abcdef"), false);
  assert.equal(isRunId("mof-20250307-080910000-abcdef"), false);
  assert.equal(isRunId("mof-20250307-080910000-ABCDEF123456"), false);
  assert.equal(isRunId("run"), false);
});

section("Formatting");

test("entry without context", () => {
  assert.equal(
    formatLogEntry("info", "Run started", "mof-20250307-abcdef", undefined, NOW),
    "[2025-03-07T08:09:10.000Z] [INFO ] [mof-20250307-abcdef] Run started"
  );
});

test("entry with context and no run id", () => {
  assert.equal(
    formatLogEntry("warn", "Skipping", undefined, { line: 3 }, NOW),
    '[2025-03-07T08:09:10.000Z] [WARN ] [no-run-id] Skipping {"line":3}'
  );
});

test("empty context is omitted", () => {
  assert.equal(
    formatLogEntry("error", "Boom", "r", {}, NOW),
    "[2025-03-07T08:09:10.000Z] [ERROR] [r] Boom"
  );
});

test("isLogLevel", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("trace"), false);
});

section("File output");

const LOG_DIR = mkdtempSync(join(tmpdir(), "logging-test-"));

test("file logger filters by level and stamps child run ids", () => {
  const logger = createLogger({ level: "warn", console: false, file: true, logDir: LOG_DIR, logFile: "t.log" });
  logger.info("hidden");
  logger.warn("top-level warning");
  logger.child("mof-20250307-abcdef").error("run failed", { stage: "spec" });

  const lines = readFileSync(join(LOG_DIR, "t.log"), "utf-8").trimEnd().split("\n");
  assert.equal(lines.length, 2);
  assert.match(lines[0], /^\[[^\]]+\] \[WARN \] \[no-run-id\] top-level warning$/);
  assert.match(lines[1], /^\[[^\]]+\] \[ERROR\] \[mof-20250307-abcdef\] run failed \{"stage":"spec"\}$/);
});

test("silent logger children are silent", () => {
  assert.equal(silentLogger.child("x"), silentLogger);
});

rmSync(LOG_DIR, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
