#!/usr/bin/env node
/**
 * CLI command to validate the agent configuration.
 *
 * Validates:
 * - Environment and AgentConfig
 * - Prompt templates for every reasoning stage
 * - Local documents directory
 * - Memory file
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --fast        Resolve the fast-mode policy
 *   --verbose     Show detailed output
 *   --json        Output entire report as JSON (for CI parsing)
 *   -h, --help    Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { parseArgs } from "node:util";

import {
  loadConfigFromEnv,
  resolveModePolicy,
  AgentConfigError,
  ConfigError,
  type AgentConfig,
  type ModePolicy,
} from "../config/index.js";
import { MemoryStore } from "../memory/index.js";
import { PromptTemplateLoader } from "../prompts/index.js";
import { STAGE_NAMES, STAGE_TEMPLATE_VARIABLES } from "../reasoning/index.js";
import { listDocuments } from "../retrieval/index.js";
import {
  c,
  printDetail,
  printError,
  printFailure,
  printHeader,
  printSuccess,
} from "./output.js";

interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  config?: Readonly<AgentConfig>;
  policy?: ModePolicy;
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      fast: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --fast        Resolve the fast-mode policy
  --verbose     Show detailed output
  --json        Output entire report as JSON (for CI parsing)
  -h, --help    Show this help message
`);
    process.exit(0);
  }

  return values;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function runConfigStep(fast: boolean): { step: StepResult; config?: Readonly<AgentConfig> } {
  try {
    const config = loadConfigFromEnv(process.env, fast ? { mode: "fast" } : {});
    return {
      step: {
        success: true,
        component: "AgentConfig",
        message: `loaded (${config.mode} mode)`,
        details: [
          `Model: ${config.model.name} (temperature ${config.model.temperature})`,
          `Literature: ${config.literature.maxDocs} docs, ${config.literature.timeoutMs} ms timeout`,
          `Memory: ${config.memory.file}, k=${config.memory.retrieveK}`,
          `Retrieval: ${config.retrieval.chunkSize}/${config.retrieval.chunkOverlap} chunks, top ${config.retrieval.topN}`,
          `Output: ${config.outputDir}`,
        ],
      },
      config,
    };
  } catch (err) {
    const message =
      err instanceof AgentConfigError
        ? err.format()
        : err instanceof ConfigError
          ? err.message
          : String(err);
    return {
      step: {
        success: false,
        component: "AgentConfig",
        message: "validation failed",
        details: [message],
      },
    };
  }
}

function runApiKeyStep(): StepResult {
  const present = (process.env.OPENAI_API_KEY ?? "") !== "";
  return {
    success: present,
    component: "OPENAI_API_KEY",
    message: present ? "set" : "missing (required by run-agent)",
  };
}

function runPromptsStep(config: Readonly<AgentConfig>): StepResult {
  try {
    const loader = new PromptTemplateLoader(config.promptsDir);
    const details: string[] = [];
    for (const stage of STAGE_NAMES) {
      loader.load(`${stage}.system.md`, new Set());
      const user = loader.load(`${stage}.user.md`, STAGE_TEMPLATE_VARIABLES[stage]);
      details.push(`${stage}: ${user.variables.join(", ")}`);
    }
    return {
      success: true,
      component: "Prompts",
      message: `${STAGE_NAMES.length} stages in ${config.promptsDir}`,
      details,
    };
  } catch (err) {
    return {
      success: false,
      component: "Prompts",
      message: "template validation failed",
      details: [errorMessage(err)],
    };
  }
}

async function runDocumentsStep(config: Readonly<AgentConfig>): Promise<StepResult> {
  try {
    const supported = await listDocuments(config.retrieval.documentsDir);
    return {
      success: true,
      component: "Local documents",
      message:
        supported.length > 0
          ? `${supported.length} document(s) in ${config.retrieval.documentsDir}`
          : `none found in ${config.retrieval.documentsDir} (local retrieval will be empty)`,
      details: supported,
    };
  } catch (err) {
    return {
      success: false,
      component: "Local documents",
      message: "directory unreadable",
      details: [errorMessage(err)],
    };
  }
}

async function runMemoryStep(config: Readonly<AgentConfig>): Promise<StepResult> {
  try {
    const records = await new MemoryStore(config.memory.file).loadAll();
    return {
      success: true,
      component: "Memory",
      message: `${records.length} record(s) in ${config.memory.file}`,
    };
  } catch (err) {
    return {
      success: false,
      component: "Memory",
      message: "memory file unreadable",
      details: [errorMessage(err)],
    };
  }
}

function buildReport(
  steps: StepResult[],
  config?: Readonly<AgentConfig>,
  policy?: ModePolicy
): ValidationReport {
  const passed = steps.filter((s) => s.success).length;
  return {
    timestamp: new Date().toISOString(),
    steps,
    config,
    policy,
    summary: {
      stepsPassed: passed,
      stepsFailed: steps.length - passed,
      stepsTotal: steps.length,
    },
  };
}

function printPolicy(policy: ModePolicy): void {
  console.log(c("cyan", "Mode policy"));
  printDetail(`mode: ${policy.mode}`);
  printDetail(`novelty check: ${policy.noveltyEnabled ? "on" : "off"}`);
  printDetail(`literature search: ${policy.literatureEnabled ? `on (${policy.literatureMaxDocs} docs)` : "off"}`);
  printDetail(`memory: k=${policy.memoryK}, ${policy.memoryContextChars} chars`);
  printDetail(`caps: literature ${policy.charCaps.literature}, local ${policy.charCaps.local} chars`);
  console.log("");
}

function printFooter(passed: number, failed: number): void {
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

async function main(): Promise<number> {
  const args = parseCliArgs();
  const isJson = args.json === true;
  const isVerbose = args.verbose === true;
  const steps: StepResult[] = [];

  if (!isJson) {
    printHeader("Agent Configuration Validation");
  }

  function record(step: StepResult): void {
    steps.push(step);
    if (isJson) return;

    if (step.success) {
      printSuccess(step.component, step.message);
      if (isVerbose) {
        step.details?.forEach((d) => printDetail(d));
      }
    } else {
      printFailure(step.component, step.message);
      step.details?.forEach((d) => printError(d));
    }
    console.log("");
  }

  const { step: configStep, config } = runConfigStep(args.fast === true);
  record(configStep);
  record(runApiKeyStep());

  let policy: ModePolicy | undefined;
  if (config) {
    policy = resolveModePolicy(config);
    record(runPromptsStep(config));
    record(await runDocumentsStep(config));
    record(await runMemoryStep(config));
  }

  const report = buildReport(steps, config, policy);

  if (isJson) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    if (policy) printPolicy(policy);
    printFooter(report.summary.stepsPassed, report.summary.stepsFailed);
  }

  return report.summary.stepsFailed > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  });
