/**
 * Reasoning stage runner.
 *
 * A ReasoningPredictor is the opaque structured-output generator (a chat
 * model behind a schema, or a test fake). ReasoningStage wraps it with the
 * stage contracts: every result is validated against the stage's schema
 * and frozen, and any non-validation failure is reported as a
 * TransportError.
 */

import { ConcurrentStageCallError, TransportError, ValidationError } from "./errors.js";
import { STAGE_OUTPUT_SCHEMAS, type StageInputMap, type StageName, type StageOutputMap } from "./stages.js";
import { deepFreeze } from "../utils/freeze.js";
import { silentLogger, type Logger } from "../logging/index.js";

export interface ReasoningPredictor {
  /**
   * Produce the raw record for one stage. May throw ValidationError or
   * TransportError; anything else is treated as a transport failure.
   */
  predict<S extends StageName>(stage: S, input: StageInputMap[S]): Promise<unknown>;
}

export interface ReasoningStageOptions {
  logger?: Logger;
}

export class ReasoningStage {
  private readonly logger: Logger;
  private inFlight: StageName | null = null;
  private calls = 0;

  constructor(
    private readonly predictor: ReasoningPredictor,
    options: ReasoningStageOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Number of predictor calls issued so far */
  get callCount(): number {
    return this.calls;
  }

  /**
   * Run one stage.
   *
   * @throws ValidationError if the record does not match the stage schema
   * @throws TransportError if the predictor fails
   * @throws ConcurrentStageCallError if another stage call is outstanding
   */
  async run<S extends StageName>(stage: S, input: StageInputMap[S]): Promise<Readonly<StageOutputMap[S]>> {
    if (this.inFlight !== null) {
      throw new ConcurrentStageCallError(stage, this.inFlight);
    }

    this.inFlight = stage;
    this.calls++;
    const startedAt = Date.now();

    let raw: unknown;
    try {
      raw = await this.predictor.predict(stage, input);
    } catch (err) {
      if (err instanceof ValidationError || err instanceof TransportError) {
        throw err;
      }
      throw new TransportError(stage, err instanceof Error ? err.message : String(err), { cause: err });
    } finally {
      this.inFlight = null;
    }

    const result = STAGE_OUTPUT_SCHEMAS[stage].safeParse(raw);
    if (!result.success) {
      throw new ValidationError(
        stage,
        result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
    }

    this.logger.debug("Stage completed", { stage, durationMs: Date.now() - startedAt });
    return deepFreeze(result.data);
  }
}
