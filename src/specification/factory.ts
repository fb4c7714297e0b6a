/**
 * Experiment specification factory.
 *
 * The spec stage's output is validated here a second time, after the
 * controller has pinned the run identity fields, so the sink only ever
 * sees a complete, frozen specification.
 */

import { ExperimentSpecSchema, type ExperimentSpec, type NoveltyVerdict } from "./schema.js";
import { deepFreeze } from "../utils/freeze.js";

/**
 * Validation error for specification creation and loading.
 */
export class SpecificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpecificationError";
  }
}

/**
 * Validate a candidate specification and freeze it.
 *
 * @throws SpecificationError if validation fails
 */
export function createExperimentSpec(candidate: unknown): Readonly<ExperimentSpec> {
  const result = ExperimentSpecSchema.safeParse(candidate);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new SpecificationError(`Invalid experiment specification: ${errors}`);
  }

  return deepFreeze(result.data);
}

/**
 * Fields the controller owns. The predictor may echo them back wrong; the
 * state's values win.
 */
export interface SpecIdentity {
  runId: string;
  queryOriginal: string;
  queryCanonical: string;
  /** Gate verdict the spec was generated under */
  novelty: NoveltyVerdict;
}

/**
 * Replace the identity fields and the novelty check of a predicted spec
 * with the run's values.
 */
export function bindSpecIdentity(
  spec: ExperimentSpec,
  identity: SpecIdentity
): Readonly<ExperimentSpec> {
  return createExperimentSpec({
    ...spec,
    runId: identity.runId,
    queryOriginal: identity.queryOriginal,
    queryCanonical: identity.queryCanonical,
    noveltyCheck: {
      status: identity.novelty.status,
      references: identity.novelty.references,
    },
  });
}
