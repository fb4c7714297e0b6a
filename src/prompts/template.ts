/**
 * Prompt template parsing and variable extraction.
 *
 * A prompt template is a plain-text string (loaded from a .md or .txt file)
 * containing `{{variableName}}` placeholders. Templates are validated
 * against the variables a stage declares, so a typo in a template fails at
 * load time instead of producing a prompt with a literal `{{…}}` in it.
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are alphanumeric (dots allowed)
 *   - Whitespace inside braces is trimmed: {{ query }} is valid
 *   - Duplicate placeholders are fine (same value rendered)
 */

/**
 * Matches `{{variable}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

/**
 * A parsed and validated prompt template.
 */
export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: string[];
  /** Optional name/id for error messages. */
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    found.add(match[1]);
  }
  return [...found].sort();
}

/**
 * Parse a template string.
 *
 * @param source  - The raw template text
 * @param name    - Template name for error messages
 * @param allowed - Variables the template may reference; omit to accept any
 * @throws TemplateParseError if a placeholder is not in `allowed`
 */
export function parseTemplate(
  source: string,
  name?: string,
  allowed?: ReadonlySet<string>
): ParsedTemplate {
  const variables = extractVariables(source);

  if (allowed) {
    const invalid = variables.filter((v) => !allowed.has(v));
    if (invalid.length > 0) {
      throw new TemplateParseError(name ?? "(anonymous)", invalid);
    }
  }

  return { source, variables, name };
}
