/**
 * Reasoning stages: contracts, runner and the model-backed predictor.
 */

export {
  STAGE_NAMES,
  STAGE_OUTPUT_SCHEMAS,
  STAGE_TEMPLATE_VARIABLES,
  NO_LITERATURE,
  NO_LOCAL_CONTEXT,
  stagePromptVariables,
  type StageName,
  type StageInputMap,
  type StageOutputMap,
} from "./stages.js";
export { ValidationError, TransportError, ConcurrentStageCallError } from "./errors.js";
export { ReasoningStage, type ReasoningPredictor, type ReasoningStageOptions } from "./predictor.js";
export { AiSdkPredictor, createOpenAiPredictor, type AiPredictorOptions } from "./ai-predictor.js";
