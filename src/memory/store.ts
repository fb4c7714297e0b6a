/**
 * Persistent memory of past runs.
 *
 * Records live in a JSONL file, one self-contained JSON object per line.
 * Each append is a single write of a single line, so a crash mid-write can
 * at worst leave one unparsable trailing line, which loadAll() skips.
 * Concurrent runs can share the file without locking.
 *
 * Retention is not handled here: the log is never rewritten.
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { MemoryRecordSchema, type MemoryRecord } from "./schema.js";
import { jaccard, recordTokens, tokenize } from "./similarity.js";
import { silentLogger, type Logger } from "../logging/index.js";

export const NO_MEMORY_CONTEXT = "(no prior memory)";

export class MemoryStoreError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "MemoryStoreError";
  }
}

export interface MemoryStoreOptions {
  logger?: Logger;
}

/**
 * A record with its retrieval score.
 */
export interface ScoredMemoryRecord {
  record: MemoryRecord;
  score: number;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class MemoryStore {
  private readonly logger: Logger;

  constructor(
    public readonly filePath: string,
    options: MemoryStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Append one record.
   *
   * @throws MemoryStoreError if the record is invalid or cannot be written
   */
  async append(record: MemoryRecord): Promise<void> {
    const result = MemoryRecordSchema.safeParse(record);
    if (!result.success) {
      const errors = result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new MemoryStoreError(this.filePath, `Invalid memory record: ${errors}`);
    }

    const line = JSON.stringify(result.data) + "\n";
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, { encoding: "utf-8", flag: "a" });
    } catch (err) {
      throw new MemoryStoreError(
        this.filePath,
        `Failed to append memory record: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    this.logger.debug("Memory record appended", { runId: record.runId, verdict: record.verdict });
  }

  /**
   * Load every valid record in file order (oldest first).
   * A missing file is an empty store. Corrupt lines are skipped.
   */
  async loadAll(): Promise<MemoryRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new MemoryStoreError(
        this.filePath,
        `Failed to read memory file: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const records: MemoryRecord[] = [];
    const lines = raw.split("\n");

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        this.logger.warn("Skipping unparsable memory record", { file: this.filePath, line: i + 1 });
        continue;
      }

      const result = MemoryRecordSchema.safeParse(parsed);
      if (!result.success) {
        this.logger.warn("Skipping invalid memory record", {
          file: this.filePath,
          line: i + 1,
          issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
        continue;
      }

      records.push(result.data);
    }

    return records;
  }

  /**
   * Score every record against the query and return the best k,
   * ties broken most-recent-first.
   */
  async topKScored(query: string, k: number): Promise<ScoredMemoryRecord[]> {
    if (k <= 0) {
      return [];
    }

    const records = await this.loadAll();
    const queryTokens = new Set(tokenize(query));

    const scored = records.map((record, position) => ({
      record,
      score: jaccard(queryTokens, recordTokens(record)),
      position,
    }));

    scored.sort((a, b) => b.score - a.score || b.position - a.position);

    return scored.slice(0, k).map(({ record, score }) => ({ record, score }));
  }

  /**
   * Top-k most similar records, best first.
   */
  async topK(query: string, k: number): Promise<MemoryRecord[]> {
    const scored = await this.topKScored(query, k);
    return scored.map((s) => s.record);
  }
}

/**
 * Render one record as a PAST_RUN block.
 */
export function formatMemoryRecord(record: MemoryRecord): string {
  return [
    `PAST_RUN: run_id=${record.runId}; material=${record.material ?? ""}; ` +
      `task=${record.taskType ?? ""}; verdict=${record.verdict}`,
    `  original=${record.queryOriginal}`,
    `  canonical=${record.queryCanonical}`,
  ].join("\n");
}

/**
 * Render records into a bounded prompt context, preserving their order.
 *
 * Whole trailing blocks are dropped to respect `maxChars`. If even the
 * first block is too long it is cut at `maxChars`.
 */
export function formatMemoryContext(records: readonly MemoryRecord[], maxChars: number): string {
  if (records.length === 0) {
    return NO_MEMORY_CONTEXT;
  }

  const blocks = records.map(formatMemoryRecord);
  const kept: string[] = [];
  let length = 0;

  for (const block of blocks) {
    const added = kept.length === 0 ? block.length : block.length + 1;
    if (length + added > maxChars) break;
    kept.push(block);
    length += added;
  }

  if (kept.length === 0) {
    return blocks[0].slice(0, maxChars);
  }

  return kept.join("\n");
}
