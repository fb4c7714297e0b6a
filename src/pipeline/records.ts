/**
 * Memory records built from a finished run's state.
 */

import type { MemoryRecord } from "../memory/schema.js";
import type { NoveltyVerdict } from "../specification/schema.js";
import type { AgentState } from "./state.js";

/**
 * Record for a run that reached a novelty verdict (rejected, or spec written).
 */
export function verdictRecord(
  state: AgentState,
  novelty: NoveltyVerdict,
  now: Date = new Date()
): MemoryRecord {
  const intent = state.get("intent");
  const spec = state.peek("spec");

  return {
    runId: state.runId,
    timestamp: now.toISOString(),
    mode: state.mode,
    queryOriginal: state.rawQuery,
    queryCanonical: state.get("canonical").query,
    material: intent.material ?? spec?.structure.id ?? null,
    taskType: spec?.task.type ?? intent.taskType,
    verdict: novelty.status,
    rationale: novelty.rationale,
  };
}

/**
 * Record for a run that stopped on an error. Uses whatever the state holds.
 */
export function failureRecord(state: AgentState, error: Error, now: Date = new Date()): MemoryRecord {
  const intent = state.peek("intent");
  const canonical = state.peek("canonical");

  return {
    runId: state.runId,
    timestamp: now.toISOString(),
    mode: state.mode,
    queryOriginal: state.rawQuery,
    queryCanonical: canonical?.query ?? "",
    material: intent?.material ?? null,
    taskType: intent?.taskType ?? null,
    verdict: "failed",
    rationale: error.message,
  };
}
