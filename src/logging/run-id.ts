/**
 * Run ID generation.
 * Each pipeline run gets a unique run ID used for tracing, output file
 * naming and memory records.
 */

import { randomBytes } from "node:crypto";

/** Default prefix for experiment run IDs */
export const RUN_ID_PREFIX = "mof";

const RUN_ID_RE = /^[a-z][a-z0-9]*-\d{8}-\d{9}-[a-f0-9]{12}$/;

/**
 * Generate a unique run ID.
 * Format: prefix + UTC date + UTC time to the millisecond + 48 random bits
 * (e.g., "mof-20240115-083015123-a1b2c3d4e5f6")
 */
export function generateRunId(prefix: string = RUN_ID_PREFIX, now: Date = new Date()): string {
  const iso = now.toISOString();
  const datePart = iso.slice(0, 10).replace(/-/g, "");
  const timePart = iso.slice(11, 23).replace(/[:.]/g, "");
  const randomPart = randomBytes(6).toString("hex");
  return `${prefix}-${datePart}-${timePart}-${randomPart}`;
}

/**
 * Check whether a string has the shape produced by generateRunId().
 */
export function isRunId(value: string): boolean {
  return RUN_ID_RE.test(value);
}
