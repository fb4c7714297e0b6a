/**
 * Agent state tests.
 *
 * Run: node --import tsx src/pipeline/state.test.ts
 *
 * Every field is write-once and must be written in pipeline order.
 */

import { strict as assert } from "node:assert";

import { AgentState, StateError, STATE_FIELD_ORDER } from "./state.js";
import { StageStatus } from "../types/pipeline.js";
import type { QueryIntent } from "../specification/schema.js";

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

const INTENT: QueryIntent = {
  material: "UiO-66",
  goal: "relax the structure",
  taskType: "relaxation",
  missingInputs: ["structure file"],
  ambiguityFlags: [],
  feasible: true,
};

function newState(): AgentState {
  return new AgentState({ rawQuery: "Relax UiO-66", runId: "mof-20250307-abcdef", mode: "normal" });
}

section("Write-once ordering");

test("fields written in order are readable", () => {
  const state = newState();
  state.set("memoryContext", "(no prior memory)");
  state.set("intent", INTENT);
  state.set("canonical", { query: "Relax UiO-66", clarifyingQuestions: [] });
  state.set("literature", "");
  state.set("localContext", []);
  state.set("novelty", { status: "pass", rationale: "novel", references: [] });
  assert.equal(state.get("intent").material, "UiO-66");
  assert.deepEqual(state.writtenFields, STATE_FIELD_ORDER.slice(0, 6));
  assert.equal(state.has("spec"), false);
});

test("writing a field twice throws", () => {
  const state = newState();
  state.set("memoryContext", "a");
  assert.throws(() => state.set("memoryContext", "b"), (err: unknown) => {
    assert.ok(err instanceof StateError);
    assert.equal(err.field, "memoryContext");
    assert.equal(err.message, 'State field "memoryContext" is already set');
    return true;
  });
  assert.equal(state.get("memoryContext"), "a");
});

test("writing before predecessors throws", () => {
  const state = newState();
  state.set("memoryContext", "a");
  assert.throws(
    () => state.set("literature", ""),
    (err: unknown) => {
      assert.ok(err instanceof StateError);
      assert.equal(err.message, 'State field "literature" set before "intent", "canonical"');
      return true;
    }
  );
  assert.equal(state.has("literature"), false);
});

test("reading an unset field throws; peek does not", () => {
  const state = newState();
  assert.throws(() => state.get("intent"), StateError);
  assert.equal(state.peek("intent"), undefined);
});

test("empty values count as written", () => {
  const state = newState();
  state.set("memoryContext", "");
  assert.equal(state.get("memoryContext"), "");
  assert.equal(state.has("memoryContext"), true);
});

test("stored values are frozen", () => {
  const state = newState();
  state.set("memoryContext", "");
  const intent = { ...INTENT, missingInputs: ["cif"] };
  state.set("intent", intent);
  assert.ok(Object.isFrozen(state.get("intent")));
  assert.equal(Reflect.set(state.get("intent").missingInputs, 0, "other"), false);
});

section("Stage trace");

test("stages record status and timestamps", () => {
  const state = newState();
  const t0 = new Date("2025-03-07T00:00:00.000Z");
  const t1 = new Date("2025-03-07T00:00:01.000Z");
  state.beginStage("init", t0);
  state.endStage("init", StageStatus.Completed, undefined, t1);
  state.beginStage("intent", t1);
  state.endStage("intent", StageStatus.Failed, "boom", t1);
  assert.deepEqual(state.trace, [
    {
      stage: "init",
      status: StageStatus.Completed,
      startedAt: "2025-03-07T00:00:00.000Z",
      endedAt: "2025-03-07T00:00:01.000Z",
    },
    {
      stage: "intent",
      status: StageStatus.Failed,
      startedAt: "2025-03-07T00:00:01.000Z",
      endedAt: "2025-03-07T00:00:01.000Z",
      error: "boom",
    },
  ]);
});

test("ending a stage that is not running throws", () => {
  const state = newState();
  assert.throws(() => state.endStage("spec", StageStatus.Completed));
});

test("toJSON includes only written fields", () => {
  const state = newState();
  state.set("memoryContext", "(no prior memory)");
  const json = state.toJSON();
  assert.equal(json.runId, "mof-20250307-abcdef");
  assert.equal(json.memoryContext, "(no prior memory)");
  assert.equal("intent" in json, false);
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
