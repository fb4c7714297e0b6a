/**
 * Reasoning stage contracts.
 *
 * Each stage declares exactly the inputs it reads and the single record it
 * produces. The controller can only call a stage with its declared input
 * type, and the result is only accepted if it parses against the stage's
 * output schema.
 *
 *   stage          input                                              output
 *   ─────────────  ─────────────────────────────────────────────────  ──────────────
 *   intent         query, memoryContext                               QueryIntent
 *   canonicalize   query, intent, memoryContext                       CanonicalQuery
 *   novelty        canonicalQuery, memoryContext, literature,         NoveltyVerdict
 *                  localContext
 *   spec           query, canonicalQuery, memoryContext, novelty,     ExperimentSpec
 *                  runId
 */

import type { z } from "zod";
import {
  CanonicalQuerySchema,
  ExperimentSpecSchema,
  NoveltyVerdictSchema,
  QueryIntentSchema,
  type CanonicalQuery,
  type ExperimentSpec,
  type NoveltyVerdict,
  type QueryIntent,
} from "../specification/schema.js";

export const STAGE_NAMES = ["intent", "canonicalize", "novelty", "spec"] as const;
export type StageName = (typeof STAGE_NAMES)[number];

export interface StageInputMap {
  intent: {
    query: string;
    memoryContext: string;
  };
  canonicalize: {
    query: string;
    intent: QueryIntent;
    memoryContext: string;
  };
  novelty: {
    canonicalQuery: string;
    memoryContext: string;
    /** Compacted literature text, empty when none was retrieved */
    literature: string;
    /** Rendered local passages, empty when none matched */
    localContext: string;
  };
  spec: {
    query: string;
    canonicalQuery: string;
    memoryContext: string;
    novelty: NoveltyVerdict;
    runId: string;
  };
}

export interface StageOutputMap {
  intent: QueryIntent;
  canonicalize: CanonicalQuery;
  novelty: NoveltyVerdict;
  spec: ExperimentSpec;
}

export const STAGE_OUTPUT_SCHEMAS: {
  [S in StageName]: z.ZodType<StageOutputMap[S], z.ZodTypeDef, unknown>;
} = {
  intent: QueryIntentSchema,
  canonicalize: CanonicalQuerySchema,
  novelty: NoveltyVerdictSchema,
  spec: ExperimentSpecSchema,
};

/** Shown to the model in place of empty retrieval results */
export const NO_LITERATURE = "(no results)";
export const NO_LOCAL_CONTEXT = "(none)";

const PROMPT_VARIABLES: {
  [S in StageName]: (input: StageInputMap[S]) => Record<string, string>;
} = {
  intent: (input) => ({
    query: input.query,
    memoryContext: input.memoryContext,
  }),
  canonicalize: (input) => ({
    query: input.query,
    intentJson: JSON.stringify(input.intent, null, 2),
    memoryContext: input.memoryContext,
  }),
  novelty: (input) => ({
    canonicalQuery: input.canonicalQuery,
    memoryContext: input.memoryContext,
    literature: input.literature || NO_LITERATURE,
    localContext: input.localContext || NO_LOCAL_CONTEXT,
  }),
  spec: (input) => ({
    query: input.query,
    canonicalQuery: input.canonicalQuery,
    memoryContext: input.memoryContext,
    noveltyJson: JSON.stringify(input.novelty, null, 2),
    runId: input.runId,
  }),
};

/**
 * Flatten a stage input into prompt template variables.
 */
export function stagePromptVariables<S extends StageName>(
  stage: S,
  input: StageInputMap[S]
): Record<string, string> {
  const build: (input: StageInputMap[S]) => Record<string, string> = PROMPT_VARIABLES[stage];
  return build(input);
}

/**
 * Variable names a stage's user template may reference.
 */
export const STAGE_TEMPLATE_VARIABLES: { readonly [S in StageName]: ReadonlySet<string> } = {
  intent: new Set(["query", "memoryContext"]),
  canonicalize: new Set(["query", "intentJson", "memoryContext"]),
  novelty: new Set(["canonicalQuery", "memoryContext", "literature", "localContext"]),
  spec: new Set(["query", "canonicalQuery", "memoryContext", "noveltyJson", "runId"]),
};
