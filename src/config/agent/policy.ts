/**
 * Mode policy.
 *
 * Fast and normal mode share one transition graph. The policy captures
 * everything that differs between them so the controller never branches
 * on the mode flag directly.
 */

import type { RunMode } from "./enums.js";
import type { AgentConfig, CharCaps } from "./schema.js";

export interface ModePolicy {
  readonly mode: RunMode;
  /** Call the novelty stage; otherwise a pass verdict is synthesized */
  readonly noveltyEnabled: boolean;
  /** Query the remote literature source */
  readonly literatureEnabled: boolean;
  /** Past runs retrieved from memory */
  readonly memoryK: number;
  /** Maximum characters of the rendered memory context */
  readonly memoryContextChars: number;
  readonly literatureMaxDocs: number;
  readonly charCaps: Readonly<CharCaps>;
}

export const FAST_MODE_RATIONALE = "fast mode: novelty check skipped";

/**
 * Resolve the policy for the configured mode.
 */
export function resolveModePolicy(config: AgentConfig): ModePolicy {
  const fast = config.mode === "fast";

  return Object.freeze({
    mode: config.mode,
    noveltyEnabled: !fast,
    literatureEnabled: !fast && config.literature.maxDocs > 0,
    memoryK: fast ? config.memory.fastRetrieveK : config.memory.retrieveK,
    memoryContextChars: config.memory.contextChars,
    literatureMaxDocs: fast ? 0 : config.literature.maxDocs,
    charCaps: fast ? config.charCaps.fast : config.charCaps.normal,
  });
}
