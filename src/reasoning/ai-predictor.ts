/**
 * Structured-output predictor backed by a chat model.
 *
 * Each stage renders a system and a user template from the prompts
 * directory and asks the model for an object matching the stage schema.
 */

import { generateObject, APICallError, NoObjectGeneratedError, TypeValidationError, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { ValidationError, TransportError } from "./errors.js";
import {
  STAGE_NAMES,
  STAGE_OUTPUT_SCHEMAS,
  STAGE_TEMPLATE_VARIABLES,
  stagePromptVariables,
  type StageInputMap,
  type StageName,
} from "./stages.js";
import type { ReasoningPredictor } from "./predictor.js";
import { PromptTemplateLoader, renderPrompt } from "../prompts/index.js";
import type { ModelSettings } from "../config/agent/schema.js";
import { silentLogger, type Logger } from "../logging/index.js";

const NO_VARIABLES: ReadonlySet<string> = new Set();

export interface AiPredictorOptions {
  model: LanguageModel;
  temperature: number;
  templates: PromptTemplateLoader;
  logger?: Logger;
}

export class AiSdkPredictor implements ReasoningPredictor {
  private readonly logger: Logger;

  constructor(private readonly options: AiPredictorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Load every stage template up front so a broken template fails before
   * the first model call.
   */
  preloadTemplates(): void {
    for (const stage of STAGE_NAMES) {
      this.prompts(stage);
    }
  }

  private prompts(stage: StageName) {
    return {
      system: this.options.templates.load(`${stage}.system.md`, NO_VARIABLES),
      user: this.options.templates.load(`${stage}.user.md`, STAGE_TEMPLATE_VARIABLES[stage]),
    };
  }

  async predict<S extends StageName>(stage: S, input: StageInputMap[S]): Promise<unknown> {
    const templates = this.prompts(stage);
    const system = renderPrompt(templates.system, {});
    const prompt = renderPrompt(templates.user, stagePromptVariables(stage, input));

    this.logger.debug("Requesting structured output", { stage, promptChars: prompt.length });

    try {
      const { object } = await generateObject({
        model: this.options.model,
        schema: STAGE_OUTPUT_SCHEMAS[stage],
        schemaName: stage,
        system,
        prompt,
        temperature: this.options.temperature,
      });
      return object;
    } catch (err) {
      if (NoObjectGeneratedError.isInstance(err) || TypeValidationError.isInstance(err)) {
        throw new ValidationError(stage, [err.message]);
      }
      if (APICallError.isInstance(err)) {
        throw new TransportError(
          stage,
          `${err.message}${err.statusCode !== undefined ? ` (HTTP ${err.statusCode})` : ""}`,
          { cause: err }
        );
      }
      throw new TransportError(stage, err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}

/**
 * Build a predictor for an OpenAI chat model.
 *
 * Strict structured outputs are off: the schemas use optional fields and
 * free-form parameter records, which strict mode rejects.
 */
export function createOpenAiPredictor(
  settings: ModelSettings,
  apiKey: string,
  templates: PromptTemplateLoader,
  logger?: Logger
): AiSdkPredictor {
  const openai = createOpenAI({ apiKey });
  return new AiSdkPredictor({
    model: openai(settings.name, { structuredOutputs: false }),
    temperature: settings.temperature,
    templates,
    logger,
  });
}
