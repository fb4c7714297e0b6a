/**
 * Agent configuration module.
 *
 * Usage:
 *   import { loadAgentConfig, DEFAULT_AGENT_CONFIG, resolveModePolicy } from "./config/agent/index.js";
 *
 *   const config = loadAgentConfig({ ...DEFAULT_AGENT_CONFIG, mode: "fast" });
 *   const policy = resolveModePolicy(config);
 */

export { TaskType, VerdictStatus, MemoryVerdict, RunMode } from "./enums.js";

export type {
  AgentConfig,
  ModelSettings,
  LiteratureSettings,
  MemorySettings,
  RetrievalSettings,
  CharCaps,
} from "./schema.js";

export {
  AgentConfigSchema,
  ModelSettingsSchema,
  LiteratureSettingsSchema,
  MemorySettingsSchema,
  RetrievalSettingsSchema,
  CharCapsSchema,
} from "./schema.js";

export {
  loadAgentConfig,
  validateAgentConfig,
  AgentConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { resolveModePolicy, FAST_MODE_RATIONALE, type ModePolicy } from "./policy.js";

export { DEFAULT_AGENT_CONFIG, BUNDLED_PROMPTS_DIR, findPackageRoot } from "./defaults.js";
