/**
 * MOF MLIP agent: turns a natural-language materials query into a
 * validated MLIP experiment specification.
 *
 * The CLIs in src/cli/ are the entry points; this module exposes the
 * building blocks for embedding the pipeline.
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./memory/index.js";
export * from "./retrieval/index.js";
export * from "./literature/index.js";
export * from "./prompts/index.js";
export * from "./reasoning/index.js";
export * from "./specification/index.js";
export * from "./pipeline/index.js";
export * from "./types/index.js";
