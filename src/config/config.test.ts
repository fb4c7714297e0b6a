/**
 * Configuration tests.
 *
 * Run: node --import tsx src/config/config.test.ts
 *
 * Tests cover:
 *   1. Environment helpers
 *   2. AgentConfig validation and immutability
 *   3. Environment mapping and CLI overrides
 *   4. Mode policy
 *   5. Bundled prompt location
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvFloat,
  optionalEnvBool,
} from "./env.js";
import {
  loadConfigFromEnv,
  loadAgentConfig,
  validateAgentConfig,
  resolveModePolicy,
  AgentConfigError,
  DEFAULT_AGENT_CONFIG,
  FAST_MODE_RATIONALE,
  BUNDLED_PROMPTS_DIR,
  findPackageRoot,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HARNESS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// 1. ENVIRONMENT HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Environment helpers");

test("requireEnv returns a set value", () => {
  assert.equal(requireEnv("OPENAI_API_KEY", { OPENAI_API_KEY: "test-secret" }), "test-secret");
});

test("requireEnv rejects missing and empty values", () => {
  assert.throws(() => requireEnv("OPENAI_API_KEY", {}), ConfigError);
  assert.throws(() => requireEnv("OPENAI_API_KEY", { OPENAI_API_KEY: "" }), ConfigError);
});

test("optionalEnv falls back on missing or empty", () => {
  assert.equal(optionalEnv("X", "dflt", {}), "dflt");
  assert.equal(optionalEnv("X", "dflt", { X: "" }), "dflt");
  assert.equal(optionalEnv("X", "dflt", { X: "set" }), "set");
});

test("optionalEnvInt parses integers and rejects garbage", () => {
  assert.equal(optionalEnvInt("N", 3, { N: "12" }), 12);
  assert.equal(optionalEnvInt("N", 3, {}), 3);
  assert.throws(() => optionalEnvInt("N", 3, { N: "many" }), ConfigError);
});

test("optionalEnvFloat parses numbers and rejects garbage", () => {
  assert.equal(optionalEnvFloat("T", 0, { T: "0.25" }), 0.25);
  assert.throws(() => optionalEnvFloat("T", 0, { T: "warm" }), ConfigError);
});

test("optionalEnvBool recognizes common spellings", () => {
  assert.equal(optionalEnvBool("B", false, { B: "YES" }), true);
  assert.equal(optionalEnvBool("B", true, { B: "0" }), false);
  assert.equal(optionalEnvBool("B", true, {}), true);
  assert.throws(() => optionalEnvBool("B", false, { B: "maybe" }), ConfigError);
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. AGENT CONFIG
// ═══════════════════════════════════════════════════════════════════════════

section("AgentConfig");

test("default config validates", () => {
  const config = loadAgentConfig(DEFAULT_AGENT_CONFIG);
  assert.equal(config.model.name, "gpt-4.1-mini");
  assert.equal(config.literature.maxDocs, 6);
  assert.equal(config.retrieval.chunkSize, 1500);
  assert.equal(config.retrieval.chunkOverlap, 200);
  assert.equal(config.memory.retrieveK, 5);
});

test("loaded config is deeply frozen", () => {
  const config = loadAgentConfig(DEFAULT_AGENT_CONFIG);
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.charCaps.normal));
  assert.equal(Reflect.set(config.model, "name", "other"), false);
  assert.equal(config.model.name, "gpt-4.1-mini");
});

test("unknown keys are rejected", () => {
  const result = validateAgentConfig({ ...DEFAULT_AGENT_CONFIG, extra: true });
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0].code, "unrecognized_keys");
});

test("chunk overlap must be smaller than chunk size", () => {
  const result = validateAgentConfig({
    ...DEFAULT_AGENT_CONFIG,
    retrieval: { ...DEFAULT_AGENT_CONFIG.retrieval, chunkSize: 200, chunkOverlap: 200 },
  });
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0].path, ["retrieval", "chunkOverlap"]);
  assert.equal(result.errors?.[0].message, "chunkOverlap must be smaller than chunkSize");
});

test("AgentConfigError formats one line per issue", () => {
  assert.throws(
    () => loadAgentConfig({ ...DEFAULT_AGENT_CONFIG, mode: "turbo", outputDir: "" }),
    (err: unknown) => {
      assert.ok(err instanceof AgentConfigError);
      assert.equal(err.issues.length, 2);
      const lines = err.format().split("\n");
      assert.equal(lines[0], "Agent configuration validation failed:");
      assert.equal(lines.length, 3);
      assert.ok(lines[1].startsWith("  - mode: "));
      assert.ok(lines[2].startsWith("  - outputDir: "));
      return true;
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. ENVIRONMENT MAPPING
// ═══════════════════════════════════════════════════════════════════════════

section("loadConfigFromEnv");

test("empty environment yields the defaults", () => {
  const config = loadConfigFromEnv({});
  assert.equal(config.mode, "normal");
  assert.equal(config.outputDir, "outputs");
  assert.equal(config.memory.file, "memory/memory_store.jsonl");
  assert.equal(config.retrieval.documentsDir, "local_pdfs");
});

test("environment variables override defaults", () => {
  const config = loadConfigFromEnv({
    LOG_LEVEL: "debug",
    OPENAI_MODEL: "gpt-test",
    OPENAI_TEMPERATURE: "0.3",
    ARXIV_MAX_DOCS: "2",
    MEMORY_RETRIEVE_K: "7",
    CHUNK_SIZE: "800",
    CHUNK_OVERLAP: "100",
    LOCAL_TOP_N: "3",
    FAST_MODE: "true",
  });
  assert.equal(config.logLevel, "debug");
  assert.equal(config.model.name, "gpt-test");
  assert.equal(config.model.temperature, 0.3);
  assert.equal(config.literature.maxDocs, 2);
  assert.equal(config.memory.retrieveK, 7);
  assert.equal(config.retrieval.chunkSize, 800);
  assert.equal(config.retrieval.chunkOverlap, 100);
  assert.equal(config.retrieval.topN, 3);
  assert.equal(config.mode, "fast");
});

test("overrides take precedence over the environment", () => {
  const config = loadConfigFromEnv(
    { FAST_MODE: "false", OUTPUT_DIR: "from-env", LOCAL_DOCS_DIR: "env-docs" },
    { mode: "fast", outputDir: "from-flag", documentsDir: "flag-docs" }
  );
  assert.equal(config.mode, "fast");
  assert.equal(config.outputDir, "from-flag");
  assert.equal(config.retrieval.documentsDir, "flag-docs");
});

test("invalid resolved values raise AgentConfigError", () => {
  assert.throws(() => loadConfigFromEnv({ LOG_LEVEL: "loud" }), AgentConfigError);
  assert.throws(() => loadConfigFromEnv({ CHUNK_OVERLAP: "5000" }), AgentConfigError);
});

test("unparsable values raise ConfigError", () => {
  assert.throws(() => loadConfigFromEnv({ ARXIV_MAX_DOCS: "six" }), ConfigError);
});

// ═══════════════════════════════════════════════════════════════════════════
// 4. MODE POLICY
// ═══════════════════════════════════════════════════════════════════════════

section("Mode policy");

test("normal mode enables novelty and literature with normal caps", () => {
  const policy = resolveModePolicy(loadAgentConfig(DEFAULT_AGENT_CONFIG));
  assert.equal(policy.noveltyEnabled, true);
  assert.equal(policy.literatureEnabled, true);
  assert.equal(policy.memoryK, 5);
  assert.equal(policy.literatureMaxDocs, 6);
  assert.deepEqual(policy.charCaps, { literature: 15000, local: 8000 });
});

test("fast mode disables novelty and literature with fast caps", () => {
  const policy = resolveModePolicy(loadAgentConfig({ ...DEFAULT_AGENT_CONFIG, mode: "fast" }));
  assert.equal(policy.noveltyEnabled, false);
  assert.equal(policy.literatureEnabled, false);
  assert.equal(policy.memoryK, 1);
  assert.equal(policy.literatureMaxDocs, 0);
  assert.deepEqual(policy.charCaps, { literature: 5000, local: 3000 });
});

test("zero literature documents disables the search in normal mode", () => {
  const policy = resolveModePolicy(
    loadAgentConfig({
      ...DEFAULT_AGENT_CONFIG,
      literature: { ...DEFAULT_AGENT_CONFIG.literature, maxDocs: 0 },
    })
  );
  assert.equal(policy.noveltyEnabled, true);
  assert.equal(policy.literatureEnabled, false);
});

test("fast rationale is fixed", () => {
  assert.equal(FAST_MODE_RATIONALE, "fast mode: novelty check skipped");
});

// ═══════════════════════════════════════════════════════════════════════════
// 5. BUNDLED PROMPT LOCATION
// ═══════════════════════════════════════════════════════════════════════════

section("Bundled prompt location");

test("package root is found from a compiled output directory", () => {
  const root = mkdtempSync(join(tmpdir(), "config-test-"));
  try {
    writeFileSync(join(root, "package.json"), "{}");
    const compiled = join(root, "dist", "src", "config", "agent");
    mkdirSync(compiled, { recursive: true });
    assert.equal(findPackageRoot(compiled), root);
    assert.equal(findPackageRoot(root), root);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test("bundled prompts sit beside package.json", () => {
  assert.ok(existsSync(join(BUNDLED_PROMPTS_DIR, "..", "package.json")));
  assert.ok(existsSync(join(BUNDLED_PROMPTS_DIR, "intent.system.md")));
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
