/**
 * Pipeline stage and run outcome definitions.
 */

export enum StageStatus {
  Pending = "pending",
  Running = "running",
  Completed = "completed",
  Skipped = "skipped",
  Failed = "failed",
}

/**
 * Controller stages in execution order.
 */
export const PIPELINE_STAGES = [
  "init",
  "intent",
  "canonicalize",
  "retrieve",
  "novelty",
  "spec",
] as const;

export type PipelineStageName = (typeof PIPELINE_STAGES)[number];

/**
 * Terminal states of a run. `rejected` is a gating outcome, not a failure.
 */
export type RunStatus = "spec_written" | "rejected" | "failed";

export interface StageTraceEntry {
  readonly stage: PipelineStageName;
  status: StageStatus;
  readonly startedAt: string;
  endedAt?: string;
  error?: string;
}
