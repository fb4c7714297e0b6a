/**
 * Memory record schema.
 *
 * One record per finished run (spec written, rejected or failed). Records
 * are appended to a JSONL log and never updated in place.
 */

import { z } from "zod";
import { MemoryVerdict, RunMode, TaskType } from "../config/agent/enums.js";

export const MemoryRecordSchema = z.object({
  runId: z.string().min(1),

  /** Run end time (ISO 8601) */
  timestamp: z.string().datetime(),

  mode: RunMode,

  queryOriginal: z.string(),

  /** Empty when the run stopped before canonicalization */
  queryCanonical: z.string(),

  material: z.string().nullable(),

  taskType: TaskType.nullable(),

  verdict: MemoryVerdict,

  /** Novelty rationale, or the error message for failed runs */
  rationale: z.string(),
});

export type MemoryRecord = z.infer<typeof MemoryRecordSchema>;
