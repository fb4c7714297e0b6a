/**
 * Shared type foundations for the agent.
 */

export * from "./pipeline.js";
