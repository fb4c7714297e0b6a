/**
 * Specification serialization.
 *
 * FILE NAMING CONVENTION:
 * Specifications are saved as: {runId}.json
 * This allows easy correlation with log lines and memory records, which
 * carry the same run ID.
 */

import { readFileSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ExperimentSpec } from "./schema.js";
import { createExperimentSpec, SpecificationError } from "./factory.js";

/**
 * Serialize a specification to a JSON string.
 */
export function serializeExperimentSpec(spec: ExperimentSpec, pretty = true): string {
  return JSON.stringify(spec, null, pretty ? 2 : undefined);
}

/**
 * Deserialize a specification from a JSON string.
 *
 * @throws SpecificationError if parsing or validation fails
 */
export function deserializeExperimentSpec(json: string): Readonly<ExperimentSpec> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new SpecificationError(
      `Failed to parse specification JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return createExperimentSpec(parsed);
}

/**
 * Standard filename for a specification.
 */
export function getSpecificationFilename(runId: string): string {
  return `${runId}.json`;
}

/**
 * Load a specification from a file.
 *
 * @throws SpecificationError if loading fails
 */
export function loadExperimentSpec(filePath: string): Readonly<ExperimentSpec> {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new SpecificationError(
      `Failed to read specification file: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return deserializeExperimentSpec(json);
}

/**
 * Destination for finished specifications, keyed by run ID.
 */
export interface SpecSink {
  /**
   * Persist the spec and resolve with its location once it is durable.
   */
  write(runId: string, spec: ExperimentSpec): Promise<string>;
}

/**
 * Writes each spec to `<directory>/<runId>.json`.
 *
 * The `wx` flag refuses to overwrite an existing file, so two runs can
 * never share an output.
 */
export class FileSpecSink implements SpecSink {
  constructor(private readonly directory: string) {}

  async write(runId: string, spec: ExperimentSpec): Promise<string> {
    if (spec.runId !== runId) {
      throw new SpecificationError(
        `Spec run ID ${spec.runId} does not match sink key ${runId}`
      );
    }

    await mkdir(this.directory, { recursive: true });
    const filePath = join(this.directory, getSpecificationFilename(runId));
    await writeFile(filePath, serializeExperimentSpec(spec), { encoding: "utf-8", flag: "wx" });
    return filePath;
  }
}

/**
 * Create a human-readable summary of a specification.
 */
export function summarizeExperimentSpec(spec: ExperimentSpec): string {
  const params = Object.entries(spec.task.parameters)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ");

  const lines: string[] = [
    "=== Experiment Specification ===",
    `Run ID: ${spec.runId}`,
    `Canonical query: ${spec.queryCanonical}`,
    "",
    `Structure: ${spec.structure.id} (${spec.structure.format}) ${spec.structure.path}`,
    `Calculator: ${spec.calculator.engine} / ${spec.calculator.model} [${spec.calculator.precision}]`,
    `Task: ${spec.task.type}${params ? ` (${params})` : ""}`,
    `Outputs: ${spec.postprocess.outputs.join(", ") || "none"}`,
    `Save trajectory: ${spec.postprocess.saveTrajectory ? "yes" : "no"}`,
    `Novelty: ${spec.noveltyCheck.status} (${spec.noveltyCheck.references.length} reference(s))`,
  ];

  if (spec.notes) {
    lines.push(`Notes: ${spec.notes}`);
  }

  return lines.join("\n");
}
