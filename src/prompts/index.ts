/**
 * Prompt templates for the reasoning stages.
 */

export {
  parseTemplate,
  extractVariables,
  TemplateParseError,
  PLACEHOLDER_RE,
  type ParsedTemplate,
} from "./template.js";
export {
  renderPrompt,
  PromptRenderError,
  UnusedVariableError,
  type PromptContext,
  type RenderOptions,
} from "./renderer.js";
export { PromptTemplateLoader, TemplateLoadError } from "./loader.js";
