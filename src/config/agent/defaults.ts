/**
 * Default agent configuration.
 *
 * Character caps operate on character counts rather than tokens. Fast mode
 * uses tighter caps so prompts stay small.
 */

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { AgentConfig } from "./schema.js";

/**
 * Nearest directory at or above `startDir` that holds a package.json.
 * The same lookup works from src/ under tsx and from dist/src/ after a build.
 *
 * @throws Error if no package.json is found up to the filesystem root
 */
export function findPackageRoot(startDir: string): string {
  let dir = startDir;
  for (;;) {
    if (existsSync(join(dir, "package.json"))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${startDir}`);
    }
    dir = parent;
  }
}

/** Prompt templates shipped with the package */
export const BUNDLED_PROMPTS_DIR = join(
  findPackageRoot(dirname(fileURLToPath(import.meta.url))),
  "prompts"
);

export const DEFAULT_AGENT_CONFIG: AgentConfig = {
  mode: "normal",
  logLevel: "info",

  model: {
    name: "gpt-4.1-mini",
    temperature: 0,
  },

  literature: {
    maxDocs: 6,
    queryMaxChars: 200,
    timeoutMs: 20_000,
  },

  memory: {
    file: "memory/memory_store.jsonl",
    retrieveK: 5,
    fastRetrieveK: 1,
    contextChars: 4_000,
  },

  retrieval: {
    documentsDir: "local_pdfs",
    chunkSize: 1_500,
    chunkOverlap: 200,
    topN: 5,
  },

  charCaps: {
    normal: { literature: 15_000, local: 8_000 },
    fast: { literature: 5_000, local: 3_000 },
  },

  outputDir: "outputs",
  promptsDir: BUNDLED_PROMPTS_DIR,
};
