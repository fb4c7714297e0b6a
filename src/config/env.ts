/**
 * Environment variable loading and validation.
 *
 * Only the CLI entry points read the environment. Everything below the
 * pipeline controller receives a resolved AgentConfig instead.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Shape of the environment the helpers read from (process.env by default). */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string, env: EnvSource = process.env): string {
  const value = env[key];
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: EnvSource = process.env
): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(
  key: string,
  defaultValue: number,
  env: EnvSource = process.env
): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a float.
 */
export function optionalEnvFloat(
  key: string,
  defaultValue: number,
  env: EnvSource = process.env
): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(
      `Environment variable ${key} must be a number, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: EnvSource = process.env
): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
