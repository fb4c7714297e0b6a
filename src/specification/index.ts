/**
 * Stage records and the experiment specification.
 *
 * ```
 *   raw query ──► QueryIntent ──► CanonicalQuery ──► NoveltyVerdict ──► ExperimentSpec
 *                                                        │
 *                                                        └─ reject: no spec
 * ```
 */

export {
  QueryIntentSchema,
  CanonicalQuerySchema,
  PaperRefSchema,
  NoveltyVerdictSchema,
  ExperimentSpecSchema,
  StructureSchema,
  CalculatorSchema,
  TaskSchema,
  PostprocessSchema,
  type QueryIntent,
  type CanonicalQuery,
  type PaperRef,
  type NoveltyVerdict,
  type ExperimentSpec,
} from "./schema.js";

export {
  createExperimentSpec,
  bindSpecIdentity,
  SpecificationError,
  type SpecIdentity,
} from "./factory.js";

export {
  serializeExperimentSpec,
  deserializeExperimentSpec,
  getSpecificationFilename,
  loadExperimentSpec,
  summarizeExperimentSpec,
  FileSpecSink,
  type SpecSink,
} from "./serialization.js";
