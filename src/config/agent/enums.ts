/**
 * Domain enumerations shared by the reasoning stages, the memory store and
 * the experiment specification.
 */

import { z } from "zod";

/**
 * MLIP-verifiable task types.
 *
 * These are the calculations a downstream MLIP engine (e.g. SevenNet) can
 * run directly from a structure file.
 */
export const TaskType = z.enum([
  "relaxation",
  "singlepoint",
  "adsorption_energy",
  "defect_energy",
]);
export type TaskType = z.infer<typeof TaskType>;

/**
 * Outcome of the novelty gate.
 *
 * `uncertain` proceeds to spec generation exactly like `pass`.
 */
export const VerdictStatus = z.enum(["pass", "reject", "uncertain"]);
export type VerdictStatus = z.infer<typeof VerdictStatus>;

/**
 * Verdict tag stored in memory records. Adds `failed` for runs that
 * stopped on a fatal stage error.
 */
export const MemoryVerdict = z.enum(["pass", "reject", "uncertain", "failed"]);
export type MemoryVerdict = z.infer<typeof MemoryVerdict>;

/**
 * Pipeline mode.
 *   normal: literature search + novelty reasoning call
 *   fast:   no literature search, synthesized novelty verdict, smaller caps
 */
export const RunMode = z.enum(["normal", "fast"]);
export type RunMode = z.infer<typeof RunMode>;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
