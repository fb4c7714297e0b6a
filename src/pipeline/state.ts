/**
 * Agent state.
 *
 * One instance per run, owned by the controller. Stage outputs are
 * write-once and must be written in pipeline order:
 *
 *   memoryContext → intent → canonical → literature → localContext → novelty → spec
 *
 * Writing a field twice, writing a field before its predecessors, or
 * reading a field that has not been written throws StateError. Stored
 * values are deep-frozen.
 */

import type { RunMode } from "../config/agent/enums.js";
import type { CanonicalQuery, ExperimentSpec, NoveltyVerdict, QueryIntent } from "../specification/schema.js";
import type { RetrievalChunk } from "../retrieval/types.js";
import { StageStatus, type PipelineStageName, type StageTraceEntry } from "../types/pipeline.js";
import { deepFreeze } from "../utils/freeze.js";

export interface AgentStateFields {
  memoryContext: string;
  intent: QueryIntent;
  canonical: CanonicalQuery;
  /** Compacted literature text; empty when disabled or unavailable */
  literature: string;
  /** Ranked local passages, best first; possibly empty */
  localContext: readonly RetrievalChunk[];
  novelty: NoveltyVerdict;
  spec: ExperimentSpec;
}

export type StateField = keyof AgentStateFields;

export const STATE_FIELD_ORDER = [
  "memoryContext",
  "intent",
  "canonical",
  "literature",
  "localContext",
  "novelty",
  "spec",
] as const satisfies readonly StateField[];

export class StateError extends Error {
  constructor(
    public readonly field: StateField,
    message: string
  ) {
    super(message);
    this.name = "StateError";
  }
}

class WriteOnceSlot<T> {
  private cell: { filled: false } | { filled: true; value: T } = { filled: false };

  get filled(): boolean {
    return this.cell.filled;
  }

  fill(value: T): void {
    this.cell = { filled: true, value };
  }

  read(): T | undefined {
    return this.cell.filled ? this.cell.value : undefined;
  }
}

function freezeValue<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    deepFreeze(value);
  }
  return value;
}

export interface AgentStateInit {
  rawQuery: string;
  runId: string;
  mode: RunMode;
}

export class AgentState {
  readonly rawQuery: string;
  readonly runId: string;
  readonly mode: RunMode;

  private readonly slots: { readonly [K in StateField]: WriteOnceSlot<AgentStateFields[K]> } = {
    memoryContext: new WriteOnceSlot(),
    intent: new WriteOnceSlot(),
    canonical: new WriteOnceSlot(),
    literature: new WriteOnceSlot(),
    localContext: new WriteOnceSlot(),
    novelty: new WriteOnceSlot(),
    spec: new WriteOnceSlot(),
  };

  private readonly stageTrace: StageTraceEntry[] = [];

  constructor(init: AgentStateInit) {
    this.rawQuery = init.rawQuery;
    this.runId = init.runId;
    this.mode = init.mode;
  }

  /**
   * Write a field once, after all of its predecessors.
   */
  set<K extends StateField>(field: K, value: AgentStateFields[K]): void {
    const slot: WriteOnceSlot<AgentStateFields[K]> = this.slots[field];
    if (slot.filled) {
      throw new StateError(field, `State field "${field}" is already set`);
    }

    const position = STATE_FIELD_ORDER.indexOf(field);
    const missing = STATE_FIELD_ORDER.slice(0, position).filter((f) => !this.slots[f].filled);
    if (missing.length > 0) {
      throw new StateError(
        field,
        `State field "${field}" set before ${missing.map((f) => `"${f}"`).join(", ")}`
      );
    }

    slot.fill(freezeValue(value));
  }

  /**
   * Read a field that must already be written.
   */
  get<K extends StateField>(field: K): AgentStateFields[K] {
    const slot: WriteOnceSlot<AgentStateFields[K]> = this.slots[field];
    const value = slot.read();
    if (!slot.filled || value === undefined) {
      throw new StateError(field, `State field "${field}" read before it was set`);
    }
    return value;
  }

  /**
   * Read a field that may not be written yet.
   */
  peek<K extends StateField>(field: K): AgentStateFields[K] | undefined {
    const slot: WriteOnceSlot<AgentStateFields[K]> = this.slots[field];
    return slot.read();
  }

  has(field: StateField): boolean {
    return this.slots[field].filled;
  }

  /** Fields written so far, in pipeline order */
  get writtenFields(): StateField[] {
    return STATE_FIELD_ORDER.filter((f) => this.slots[f].filled);
  }

  beginStage(stage: PipelineStageName, now: Date = new Date()): void {
    this.stageTrace.push({ stage, status: StageStatus.Running, startedAt: now.toISOString() });
  }

  endStage(
    stage: PipelineStageName,
    status: StageStatus.Completed | StageStatus.Skipped | StageStatus.Failed,
    error?: string,
    now: Date = new Date()
  ): void {
    const entry = [...this.stageTrace].reverse().find((e) => e.stage === stage);
    if (!entry || entry.status !== StageStatus.Running) {
      throw new Error(`Stage "${stage}" is not running`);
    }
    entry.status = status;
    entry.endedAt = now.toISOString();
    if (error !== undefined) {
      entry.error = error;
    }
  }

  get trace(): readonly Readonly<StageTraceEntry>[] {
    return this.stageTrace;
  }

  /**
   * Plain snapshot for reporting.
   */
  toJSON(): Record<string, unknown> {
    const fields: Record<string, unknown> = {};
    for (const field of STATE_FIELD_ORDER) {
      const value = this.peek(field);
      if (value !== undefined) {
        fields[field] = value;
      }
    }
    return {
      runId: this.runId,
      mode: this.mode,
      rawQuery: this.rawQuery,
      ...fields,
      trace: this.stageTrace,
    };
  }
}
