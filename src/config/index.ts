/**
 * Application configuration.
 *
 * Resolves environment variables onto the default agent configuration and
 * validates the result. Call once at process start and pass the returned
 * object into the pipeline controller.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvFloat,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";
import { DEFAULT_AGENT_CONFIG } from "./agent/defaults.js";
import { loadAgentConfig } from "./agent/loader.js";
import type { AgentConfig } from "./agent/schema.js";

export { ConfigError, requireEnv, type EnvSource } from "./env.js";

export * from "./agent/index.js";

/**
 * Values that take precedence over the environment (CLI flags).
 */
export interface ConfigOverrides {
  mode?: AgentConfig["mode"];
  outputDir?: string;
  documentsDir?: string;
}

/**
 * Build the agent configuration from environment variables.
 *
 * Recognised variables:
 *   LOG_LEVEL, OPENAI_MODEL, OPENAI_TEMPERATURE, ARXIV_MAX_DOCS,
 *   ARXIV_TIMEOUT_MS, OUTPUT_DIR, MEMORY_FILE, MEMORY_RETRIEVE_K,
 *   MEMORY_CONTEXT_CHARS, LOCAL_DOCS_DIR, CHUNK_SIZE, CHUNK_OVERLAP,
 *   LOCAL_TOP_N, FAST_MODE, PROMPTS_DIR
 *
 * @throws ConfigError if a variable cannot be parsed
 * @throws AgentConfigError if the resolved values fail validation
 */
export function loadConfigFromEnv(
  env: EnvSource = process.env,
  overrides: ConfigOverrides = {}
): Readonly<AgentConfig> {
  const d = DEFAULT_AGENT_CONFIG;
  const fast = optionalEnvBool("FAST_MODE", d.mode === "fast", env);

  return loadAgentConfig({
    mode: overrides.mode ?? (fast ? "fast" : "normal"),
    logLevel: optionalEnv("LOG_LEVEL", d.logLevel, env),
    model: {
      name: optionalEnv("OPENAI_MODEL", d.model.name, env),
      temperature: optionalEnvFloat("OPENAI_TEMPERATURE", d.model.temperature, env),
    },
    literature: {
      maxDocs: optionalEnvInt("ARXIV_MAX_DOCS", d.literature.maxDocs, env),
      queryMaxChars: d.literature.queryMaxChars,
      timeoutMs: optionalEnvInt("ARXIV_TIMEOUT_MS", d.literature.timeoutMs, env),
    },
    memory: {
      file: optionalEnv("MEMORY_FILE", d.memory.file, env),
      retrieveK: optionalEnvInt("MEMORY_RETRIEVE_K", d.memory.retrieveK, env),
      fastRetrieveK: d.memory.fastRetrieveK,
      contextChars: optionalEnvInt("MEMORY_CONTEXT_CHARS", d.memory.contextChars, env),
    },
    retrieval: {
      documentsDir:
        overrides.documentsDir ?? optionalEnv("LOCAL_DOCS_DIR", d.retrieval.documentsDir, env),
      chunkSize: optionalEnvInt("CHUNK_SIZE", d.retrieval.chunkSize, env),
      chunkOverlap: optionalEnvInt("CHUNK_OVERLAP", d.retrieval.chunkOverlap, env),
      topN: optionalEnvInt("LOCAL_TOP_N", d.retrieval.topN, env),
    },
    charCaps: d.charCaps,
    outputDir: overrides.outputDir ?? optionalEnv("OUTPUT_DIR", d.outputDir, env),
    promptsDir: optionalEnv("PROMPTS_DIR", d.promptsDir, env),
  });
}

