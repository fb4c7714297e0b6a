/**
 * Prompt template system tests.
 *
 * Run: node --import tsx src/prompts/prompts.test.ts
 *
 * Tests cover:
 *   1. Template parsing (variable extraction and validation)
 *   2. Rendering (substitution, missing vars, unused vars)
 *   3. Loader (disk-based loading and caching)
 *   4. Bundled stage templates
 */

import { strict as assert } from "node:assert";
import { writeFileSync, mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { parseTemplate, extractVariables, TemplateParseError } from "./template.js";
import { renderPrompt, PromptRenderError, UnusedVariableError } from "./renderer.js";
import { PromptTemplateLoader, TemplateLoadError } from "./loader.js";
import { BUNDLED_PROMPTS_DIR } from "../config/agent/defaults.js";
import { STAGE_NAMES, STAGE_TEMPLATE_VARIABLES } from "../reasoning/stages.js";

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
// 1. TEMPLATE PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Template parsing");

test("extracts unique variables in sorted order", () => {
  const vars = extractVariables("{{query}} then {{ memoryContext }} and {{query}} again");
  assert.deepEqual(vars, ["memoryContext", "query"]);
});

test("template without placeholders has no variables", () => {
  assert.deepEqual(extractVariables("You are a careful assistant."), []);
});

test("parseTemplate keeps the source and name", () => {
  const parsed = parseTemplate("Query: {{query}}", "intent.user");
  assert.equal(parsed.source, "Query: {{query}}");
  assert.equal(parsed.name, "intent.user");
  assert.deepEqual(parsed.variables, ["query"]);
});

test("parseTemplate accepts variables within the allowed set", () => {
  const parsed = parseTemplate("{{query}} {{memoryContext}}", "t", new Set(["query", "memoryContext"]));
  assert.deepEqual(parsed.variables, ["memoryContext", "query"]);
});

test("parseTemplate rejects unknown variables", () => {
  assert.throws(
    () => parseTemplate("{{query}} {{qeury}}", "intent.user", new Set(["query"])),
    (err: unknown) => {
      assert.ok(err instanceof TemplateParseError);
      assert.deepEqual(err.invalidVariables, ["qeury"]);
      assert.equal(err.message, 'Template "intent.user" references unknown variable(s): qeury');
      return true;
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

test("substitutes every placeholder", () => {
  const tmpl = parseTemplate("Q: {{query}}\nM: {{ memoryContext }}\nQ again: {{query}}");
  const out = renderPrompt(tmpl, { query: "Relax UiO-66", memoryContext: "(no prior memory)" });
  assert.equal(out, "Q: Relax UiO-66\nM: (no prior memory)\nQ again: Relax UiO-66");
});

test("values are inserted verbatim without re-expansion", () => {
  const tmpl = parseTemplate("[{{query}}]");
  assert.equal(renderPrompt(tmpl, { query: "{{query}}" }), "[{{query}}]");
});

test("missing values throw PromptRenderError", () => {
  const tmpl = parseTemplate("{{query}} {{memoryContext}}", "intent.user");
  assert.throws(
    () => renderPrompt(tmpl, { query: "x" }),
    (err: unknown) => {
      assert.ok(err instanceof PromptRenderError);
      assert.deepEqual(err.missingVariables, ["memoryContext"]);
      return true;
    }
  );
});

test("empty string counts as a provided value", () => {
  const tmpl = parseTemplate("<{{literature}}>");
  assert.equal(renderPrompt(tmpl, { literature: "" }), "<>");
});

test("unused values throw in strict mode", () => {
  const tmpl = parseTemplate("{{query}}", "intent.user");
  assert.throws(
    () => renderPrompt(tmpl, { query: "x", extra: "y" }),
    (err: unknown) => {
      assert.ok(err instanceof UnusedVariableError);
      assert.deepEqual(err.unusedVariables, ["extra"]);
      return true;
    }
  );
});

test("unused values are allowed when strict is off", () => {
  const tmpl = parseTemplate("{{query}}");
  assert.equal(renderPrompt(tmpl, { query: "x", extra: "y" }, { strict: false }), "x");
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. LOADER
// ═══════════════════════════════════════════════════════════════════════════

section("Loader");

const LOADER_DIR = join(tmpdir(), `prompt-test-${Date.now()}`);
mkdirSync(LOADER_DIR, { recursive: true });
writeFileSync(join(LOADER_DIR, "greet.user.md"), "Hello {{query}}");
writeFileSync(join(LOADER_DIR, "notes.json"), "{}");
writeFileSync(join(LOADER_DIR, "plain.txt"), "No variables");

test("missing directory throws TemplateLoadError", () => {
  assert.throws(
    () => new PromptTemplateLoader(join(LOADER_DIR, "does-not-exist")),
    TemplateLoadError
  );
});

test("loads and names a template by file stem", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  const tmpl = loader.load("greet.user.md", new Set(["query"]));
  assert.equal(tmpl.name, "greet.user");
  assert.deepEqual(tmpl.variables, ["query"]);
});

test("caches templates per filename", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  const first = loader.load("greet.user.md");
  writeFileSync(join(LOADER_DIR, "greet.user.md"), "Changed {{other}}");
  const second = loader.load("greet.user.md");
  assert.equal(second, first);
  writeFileSync(join(LOADER_DIR, "greet.user.md"), "Hello {{query}}");
});

test("missing file throws TemplateLoadError", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  assert.throws(() => loader.load("absent.md"), TemplateLoadError);
});

test("unsupported extension throws TemplateLoadError", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  assert.throws(() => loader.load("notes.json"), TemplateLoadError);
});

test("list returns template files only, sorted", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  assert.deepEqual(loader.list(), ["greet.user.md", "plain.txt"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// 4. BUNDLED STAGE TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════

section("Bundled stage templates");

test("every stage has a variable-free system template", () => {
  const loader = new PromptTemplateLoader(BUNDLED_PROMPTS_DIR);
  for (const stage of STAGE_NAMES) {
    const tmpl = loader.load(`${stage}.system.md`, new Set());
    assert.deepEqual(tmpl.variables, [], `${stage}.system.md`);
  }
});

test("every stage user template uses exactly its declared variables", () => {
  const loader = new PromptTemplateLoader(BUNDLED_PROMPTS_DIR);
  for (const stage of STAGE_NAMES) {
    const tmpl = loader.load(`${stage}.user.md`, STAGE_TEMPLATE_VARIABLES[stage]);
    assert.deepEqual(tmpl.variables, [...STAGE_TEMPLATE_VARIABLES[stage]].sort(), `${stage}.user.md`);
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(LOADER_DIR, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
