#!/usr/bin/env node
/**
 * Run the agent on one query.
 *
 * Usage:
 *   npx tsx src/cli/run-agent.ts "<query>" [options]
 *   npm start -- "<query>" [options]
 *
 * Options:
 *   --fast            Skip the literature search and novelty check
 *   --json            Print the run result as JSON (logs go to the log file)
 *   --output <dir>    Directory for experiment specifications
 *   --docs <dir>      Directory of local reference documents
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Spec written, or query rejected as not novel
 *   1 - Usage or configuration error
 *   2 - Run failed
 */

import { join } from "node:path";
import { parseArgs } from "node:util";

import {
  loadConfigFromEnv,
  requireEnv,
  AgentConfigError,
  ConfigError,
  type AgentConfig,
  type ConfigOverrides,
} from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { ArxivLiteratureSource } from "../literature/index.js";
import { MemoryStore } from "../memory/index.js";
import { PipelineController, type RunResult } from "../pipeline/index.js";
import { PromptTemplateLoader, TemplateLoadError, TemplateParseError } from "../prompts/index.js";
import { createOpenAiPredictor } from "../reasoning/index.js";
import { DocumentRetriever } from "../retrieval/index.js";
import { FileSpecSink, summarizeExperimentSpec } from "../specification/index.js";
import { c, printDetail } from "./output.js";

const EXIT_OK = 0;
const EXIT_USAGE = 1;
const EXIT_FAILED = 2;

const HELP = `
Usage: run-agent "<query>" [options]

Options:
  --fast            Skip the literature search and novelty check
  --json            Print the run result as JSON (logs go to the log file)
  --output <dir>    Directory for experiment specifications
  --docs <dir>      Directory of local reference documents
  -h, --help        Show this help message
`;

function parseCliArgs() {
  return parseArgs({
    allowPositionals: true,
    options: {
      fast: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      output: { type: "string" },
      docs: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

function buildController(config: AgentConfig, apiKey: string, logger: Logger): PipelineController {
  const templates = new PromptTemplateLoader(config.promptsDir);
  const predictor = createOpenAiPredictor(config.model, apiKey, templates, logger);
  predictor.preloadTemplates();

  return new PipelineController(config, {
    predictor,
    literature: new ArxivLiteratureSource({ timeoutMs: config.literature.timeoutMs, logger }),
    retriever: new DocumentRetriever({
      chunkSize: config.retrieval.chunkSize,
      chunkOverlap: config.retrieval.chunkOverlap,
      logger,
    }),
    memory: new MemoryStore(config.memory.file, { logger }),
    sink: new FileSpecSink(config.outputDir),
    logger,
  });
}

function resultToJson(result: RunResult): Record<string, unknown> {
  return {
    status: result.status,
    runId: result.runId,
    mode: result.state.mode,
    reasoningCalls: result.reasoningCalls,
    novelty: result.novelty,
    specPath: result.specPath,
    memoryRecorded: result.memoryRecorded,
    error: result.error ? { name: result.error.name, message: result.error.message } : undefined,
  };
}

function printResult(result: RunResult): void {
  console.log("");
  console.log(`${c("bold", "Run ID:")} ${result.runId} (${result.state.mode} mode)`);

  if (result.novelty) {
    const color = result.novelty.status === "reject" ? "yellow" : "green";
    console.log(`${c("bold", "Novelty:")} ${c(color, result.novelty.status)}: ${result.novelty.rationale}`);
  }

  switch (result.status) {
    case "rejected":
      console.log(c("yellow", "Query rejected; no specification written."));
      for (const ref of result.novelty?.references ?? []) {
        printDetail(`${ref.title} (${ref.id})${ref.whyRelevant ? `: ${ref.whyRelevant}` : ""}`);
      }
      break;
    case "spec_written":
      if (result.spec) {
        console.log("");
        console.log(summarizeExperimentSpec(result.spec));
      }
      console.log(`${c("green", "✓")} Specification written to ${result.specPath ?? ""}`);
      break;
    case "failed":
      console.log(`${c("red", "✗")} Run failed: ${result.error?.message ?? "unknown error"}`);
      break;
  }

  if (!result.memoryRecorded) {
    console.log(c("yellow", "Warning: the run could not be recorded in memory."));
  }
  console.log("");
}

async function main(): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(HELP);
    return EXIT_USAGE;
  }

  if (args.values.help) {
    console.log(HELP);
    return EXIT_OK;
  }

  const query = args.positionals.join(" ").trim();
  if (!query) {
    console.error("A query is required.");
    console.error(HELP);
    return EXIT_USAGE;
  }

  const overrides: ConfigOverrides = {
    mode: args.values.fast ? "fast" : undefined,
    outputDir: args.values.output,
    documentsDir: args.values.docs,
  };
  const json = args.values.json === true;

  let config: Readonly<AgentConfig>;
  let controller: PipelineController;
  try {
    config = loadConfigFromEnv(process.env, overrides);
    const logger = createLogger({
      level: config.logLevel,
      console: !json,
      file: json,
      logDir: join(config.outputDir, "logs"),
    });
    controller = buildController(config, requireEnv("OPENAI_API_KEY"), logger);
  } catch (err) {
    if (err instanceof AgentConfigError) {
      console.error(err.format());
      return EXIT_USAGE;
    }
    if (
      err instanceof ConfigError ||
      err instanceof TemplateLoadError ||
      err instanceof TemplateParseError
    ) {
      console.error(`Configuration error: ${err.message}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const result = await controller.run(query);

  if (json) {
    console.log(JSON.stringify(resultToJson(result), null, 2));
  } else {
    printResult(result);
  }

  return result.status === "failed" ? EXIT_FAILED : EXIT_OK;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Unexpected error:", err);
    process.exitCode = EXIT_FAILED;
  });
