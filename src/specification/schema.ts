/**
 * Stage record schemas.
 *
 * Every reasoning stage produces exactly one of these records. The schemas
 * are the contract with the structured-output predictor: a predictor result
 * that does not parse is a fatal ValidationError for the run.
 *
 * The `.describe()` strings are sent to the model as field documentation.
 *
 * ExperimentSpec is the terminal artifact of a successful run and the
 * input contract of a downstream MLIP executor:
 *
 * 1. STRUCTURE: which framework to load (id, file format, path)
 * 2. CALCULATOR: which MLIP engine and model to attach
 * 3. TASK: what to compute, with numeric parameters (fmax, max_steps, ...)
 * 4. POSTPROCESS: which quantities and artifacts to keep
 * 5. NOVELTY: the gate verdict the spec was generated under
 */

import { z } from "zod";
import { TaskType, VerdictStatus } from "../config/agent/enums.js";

/**
 * Structured interpretation of the raw user query.
 */
export const QueryIntentSchema = z
  .object({
    material: z
      .string()
      .nullable()
      .describe("MOF name if mentioned (e.g. UiO-66), otherwise null"),

    goal: z.string().min(1).describe("Core objective stated by the user"),

    taskType: TaskType.nullable().describe("Best guess of the MLIP-verifiable task type"),

    missingInputs: z
      .array(z.string())
      .describe("Information still needed to run the experiment (e.g. CIF path, adsorbate)"),

    ambiguityFlags: z
      .array(z.string())
      .describe("Ambiguities detected in the query"),

    feasible: z
      .boolean()
      .describe("Whether the query can be verified with an MLIP as stated"),
  })
  .strict();

export type QueryIntent = z.infer<typeof QueryIntentSchema>;

/**
 * Normalized, MLIP-testable rewrite of the query. The `query` sentence is
 * the lookup key for both retrieval sources.
 */
export const CanonicalQuerySchema = z
  .object({
    query: z
      .string()
      .min(1)
      .describe("One sentence, MLIP-verifiable rewrite of the user query"),

    clarifyingQuestions: z
      .array(z.string())
      .describe("Questions to ask the user if inputs are missing"),
  })
  .strict();

export type CanonicalQuery = z.infer<typeof CanonicalQuerySchema>;

/**
 * Reference to prior work, embedded in verdicts and specs.
 */
export const PaperRefSchema = z
  .object({
    title: z.string().describe("Paper or document title"),
    id: z.string().describe("Locator: arXiv id, URL or local file name"),
    whyRelevant: z
      .string()
      .optional()
      .describe("Short snippet explaining the overlap"),
  })
  .strict();

export type PaperRef = z.infer<typeof PaperRefSchema>;

export const NoveltyVerdictSchema = z
  .object({
    status: VerdictStatus.describe("pass: novel; reject: already done; uncertain: insufficient evidence"),
    rationale: z.string().describe("Why the verdict was reached"),
    references: z
      .array(PaperRefSchema)
      .describe("Most relevant prior work, best first"),
  })
  .strict();

export type NoveltyVerdict = z.infer<typeof NoveltyVerdictSchema>;

const TaskParameterValue = z.union([z.string(), z.number(), z.boolean()]);

export const StructureSchema = z
  .object({
    id: z.string().min(1).describe("Structure identifier, e.g. UiO-66"),
    format: z.string().min(1).describe("File format, e.g. cif"),
    path: z.string().min(1).describe("Structure file path; a placeholder if unknown"),
  })
  .strict();

export const CalculatorSchema = z
  .object({
    engine: z.string().min(1).describe("MLIP engine, e.g. sevennet"),
    model: z.string().min(1).describe("Pretrained potential name"),
    precision: z.string().min(1).describe("Numeric precision, e.g. float32"),
  })
  .strict();

export const TaskSchema = z
  .object({
    type: TaskType,
    parameters: z
      .record(z.string(), TaskParameterValue)
      .describe("Task parameters such as fmax and max_steps"),
  })
  .strict();

export const PostprocessSchema = z
  .object({
    outputs: z.array(z.string()).describe("Quantities to report, e.g. energy, forces"),
    saveTrajectory: z.boolean(),
  })
  .strict();

export const ExperimentSpecSchema = z
  .object({
    runId: z.string().min(1),
    queryOriginal: z.string().min(1),
    queryCanonical: z.string().min(1),
    structure: StructureSchema,
    calculator: CalculatorSchema,
    task: TaskSchema,
    postprocess: PostprocessSchema,
    noveltyCheck: z
      .object({
        status: VerdictStatus,
        references: z.array(PaperRefSchema),
      })
      .strict(),
    notes: z.string().describe("Short, specific assumptions and placeholders"),
  })
  .strict();

export type ExperimentSpec = z.infer<typeof ExperimentSpecSchema>;
