/**
 * Prompt template loader.
 *
 * Loads prompt templates from disk (.md or .txt files), parses and validates
 * them, and caches the parsed result. Create one loader per process and
 * reuse it across runs.
 *
 *   const loader = new PromptTemplateLoader("prompts/");
 *   const tmpl = loader.load("intent.user.md", new Set(["query", "memoryContext"]));
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

/** File extensions recognized as prompt templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

export class PromptTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing prompt template files
   * @throws TemplateLoadError if the directory does not exist
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load and parse a single template file. Results are cached per filename.
   *
   * @throws TemplateLoadError   if file is missing or has an unsupported extension
   * @throws TemplateParseError  if the template references variables outside `allowed`
   */
  load(filename: string, allowed?: ReadonlySet<string>): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const source = readFileSync(filePath, "utf-8");
    const parsed = parseTemplate(source, basename(filename, ext), allowed);

    this.cache.set(filename, parsed);
    return parsed;
  }

  /**
   * List template filenames in the base directory without loading them.
   */
  list(): string[] {
    return readdirSync(this.baseDir)
      .filter((entry) => {
        const full = join(this.baseDir, entry);
        return statSync(full).isFile() && TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
      })
      .sort();
  }
}
