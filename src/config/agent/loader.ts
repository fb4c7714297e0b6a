/**
 * Agent configuration loader and validator.
 *
 * Responsible for:
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import type { ZodIssue } from "zod";
import { AgentConfigSchema, type AgentConfig } from "./schema.js";
import { deepFreeze } from "../../utils/freeze.js";

/**
 * Structured validation error for agent configuration.
 */
export class AgentConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "AgentConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Agent configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and load agent configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen AgentConfig
 * @throws AgentConfigError if validation fails
 */
export function loadAgentConfig(input: unknown): Readonly<AgentConfig> {
  const result = AgentConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new AgentConfigError(
      `Invalid agent configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate agent configuration without loading.
 */
export function validateAgentConfig(input: unknown): {
  success: boolean;
  config?: AgentConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = AgentConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
