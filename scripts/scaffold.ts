#!/usr/bin/env node
/**
 * Create the working directories the agent reads from and writes to:
 * local documents, spec outputs and the memory log's directory.
 */

import { mkdir, writeFile, access } from "node:fs/promises";
import { dirname, join } from "node:path";
import { DEFAULT_AGENT_CONFIG } from "../src/config/agent/defaults.js";

const DIRECTORIES = [
  DEFAULT_AGENT_CONFIG.retrieval.documentsDir,
  DEFAULT_AGENT_CONFIG.outputDir,
  dirname(DEFAULT_AGENT_CONFIG.memory.file),
] as const;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function scaffold(rootDir: string): Promise<void> {
  console.log(`Scaffolding agent directories in: ${rootDir}`);

  for (const dir of DIRECTORIES) {
    const dirPath = join(rootDir, dir);
    const gitkeepPath = join(dirPath, ".gitkeep");

    if (await exists(dirPath)) {
      console.log(`  [exists] ${dir}/`);
    } else {
      await mkdir(dirPath, { recursive: true });
      console.log(`  [created] ${dir}/`);
    }

    if (!(await exists(gitkeepPath))) {
      await writeFile(gitkeepPath, "");
      console.log(`  [created] ${dir}/.gitkeep`);
    }
  }

  console.log("\nScaffolding complete.");
}

const rootDir = process.argv[2] ?? process.cwd();
scaffold(rootDir).catch((err: unknown) => {
  console.error("Scaffolding failed:", err);
  process.exit(1);
});
