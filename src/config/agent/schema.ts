/**
 * Agent configuration schema definition.
 *
 * The configuration is resolved once at process start (see loadConfigFromEnv)
 * and then passed by reference into the pipeline controller. No component
 * below the controller reads environment variables.
 */

import { z } from "zod";
import { LogLevelSchema, RunMode } from "./enums.js";

/**
 * Model settings for the structured-output predictor.
 */
export const ModelSettingsSchema = z
  .object({
    /** Chat model identifier */
    name: z.string().min(1).describe("Chat model used by every reasoning stage"),

    /** Sampling temperature */
    temperature: z
      .number()
      .min(0)
      .max(2)
      .describe("Sampling temperature for reasoning calls"),
  })
  .strict();

export type ModelSettings = z.infer<typeof ModelSettingsSchema>;

/**
 * Remote literature search settings.
 */
export const LiteratureSettingsSchema = z
  .object({
    maxDocs: z
      .number()
      .int()
      .min(0)
      .describe("Upper bound on arXiv documents fetched per run"),

    /** Long canonical queries are clipped before being sent to arXiv */
    queryMaxChars: z
      .number()
      .int()
      .min(1)
      .describe("Maximum characters of the search query sent to arXiv"),

    timeoutMs: z
      .number()
      .int()
      .min(1)
      .describe("Timeout for one literature fetch, in milliseconds"),
  })
  .strict();

export type LiteratureSettings = z.infer<typeof LiteratureSettingsSchema>;

/**
 * Persistent memory settings.
 */
export const MemorySettingsSchema = z
  .object({
    file: z.string().min(1).describe("Path of the JSONL memory log"),

    retrieveK: z
      .number()
      .int()
      .min(0)
      .describe("Past runs injected into prompts in normal mode"),

    fastRetrieveK: z
      .number()
      .int()
      .min(0)
      .describe("Past runs injected into prompts in fast mode"),

    contextChars: z
      .number()
      .int()
      .min(1)
      .describe("Maximum characters of the rendered memory context"),
  })
  .strict();

export type MemorySettings = z.infer<typeof MemorySettingsSchema>;

/**
 * Local document retrieval settings.
 */
export const RetrievalSettingsSchema = z
  .object({
    documentsDir: z
      .string()
      .min(1)
      .describe("Directory scanned for .pdf, .txt and .md documents"),

    chunkSize: z.number().int().min(1).describe("Chunk window size in characters"),

    chunkOverlap: z
      .number()
      .int()
      .min(0)
      .describe("Characters shared by consecutive chunks"),

    topN: z.number().int().min(1).describe("Passages returned per search"),
  })
  .strict()
  .refine((r) => r.chunkOverlap < r.chunkSize, {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  });

export type RetrievalSettings = z.infer<typeof RetrievalSettingsSchema>;

/**
 * Character caps applied to retrieved context before it enters the state.
 */
export const CharCapsSchema = z
  .object({
    literature: z.number().int().min(0),
    local: z.number().int().min(0),
  })
  .strict();

export type CharCaps = z.infer<typeof CharCapsSchema>;

/**
 * Complete agent configuration schema.
 */
export const AgentConfigSchema = z
  .object({
    mode: RunMode.describe("Pipeline mode: normal or fast"),

    logLevel: LogLevelSchema.describe("Minimum log level"),

    model: ModelSettingsSchema,

    literature: LiteratureSettingsSchema,

    memory: MemorySettingsSchema,

    retrieval: RetrievalSettingsSchema,

    charCaps: z
      .object({
        normal: CharCapsSchema,
        fast: CharCapsSchema,
      })
      .strict()
      .describe("Context caps per mode"),

    outputDir: z.string().min(1).describe("Directory experiment specs are written to"),

    promptsDir: z.string().min(1).describe("Directory holding stage prompt templates"),
  })
  .strict();

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
