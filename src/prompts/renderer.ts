/**
 * Prompt renderer.
 *
 * Purely mechanical substitution: every placeholder in the template must
 * have a value in the context. In strict mode every context value must
 * also be used, which catches a stage passing inputs its template ignores.
 */

import { PLACEHOLDER_RE, type ParsedTemplate } from "./template.js";

export type PromptContext = Readonly<Record<string, string>>;

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": context is missing ` +
          `value(s) for: ${missingVariables.join(", ")}`
    );
    this.name = "PromptRenderError";
  }
}

export class UnusedVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" does not use context variable(s): ${unusedVariables.join(", ")}. ` +
          `Pass { strict: false } to allow unused variables.`
    );
    this.name = "UnusedVariableError";
  }
}

export interface RenderOptions {
  /**
   * When true (default), rendering fails if the context contains variables
   * that the template does not reference.
   */
  strict?: boolean;
}

/**
 * Render a parsed template against a context.
 *
 * @throws PromptRenderError   if a placeholder has no value
 * @throws UnusedVariableError if strict mode is on and the context has unused values
 */
export function renderPrompt(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const { strict = true } = options;
  const templateName = template.name ?? "(anonymous)";

  const missing = template.variables.filter((v) => !Object.hasOwn(context, v));
  if (missing.length > 0) {
    throw new PromptRenderError(templateName, missing);
  }

  if (strict) {
    const used = new Set(template.variables);
    const unused = Object.keys(context).filter((k) => !used.has(k));
    if (unused.length > 0) {
      throw new UnusedVariableError(templateName, unused);
    }
  }

  // Values are inserted verbatim: a value containing "{{x}}" is not expanded.
  return template.source.replace(PLACEHOLDER_RE, (_match, name: string) => context[name] ?? "");
}
