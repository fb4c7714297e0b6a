/**
 * Reasoning stage errors. Both are fatal for the run.
 */

import type { StageName } from "./stages.js";

/**
 * The predictor returned a record that does not match the stage schema.
 */
export class ValidationError extends Error {
  constructor(
    public readonly stage: StageName,
    public readonly issues: string[],
    message?: string
  ) {
    super(message ?? `Stage "${stage}" returned an invalid record: ${issues.join("; ")}`);
    this.name = "ValidationError";
  }
}

/**
 * The predictor could not be reached or the provider failed.
 */
export class TransportError extends Error {
  constructor(
    public readonly stage: StageName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Stage "${stage}" transport failure: ${message}`, options);
    this.name = "TransportError";
  }
}

/**
 * A second reasoning call was issued while one was still outstanding.
 */
export class ConcurrentStageCallError extends Error {
  constructor(
    public readonly stage: StageName,
    public readonly inFlight: StageName
  ) {
    super(`Stage "${stage}" called while "${inFlight}" is still running`);
    this.name = "ConcurrentStageCallError";
  }
}
