/**
 * Pipeline controller.
 *
 * Drives one run through a fixed graph:
 *
 *   init → intent → canonicalize → retrieve → novelty|skip ─┬─ reject → done(rejected)
 *                                                           └─ pass/uncertain → spec → done(spec_written)
 *
 * The graph is the same in both modes; the ModePolicy decides limits and
 * whether the novelty node calls the predictor. Any fatal error ends the
 * run as `failed` after a best-effort memory record.
 */

import type { AgentConfig } from "../config/agent/schema.js";
import { FAST_MODE_RATIONALE, resolveModePolicy, type ModePolicy } from "../config/agent/policy.js";
import { clipQuery, toLiteratureUnits, LITERATURE_UNIT_SEPARATOR } from "../literature/compact.js";
import type { LiteratureSource } from "../literature/types.js";
import { generateRunId } from "../logging/run-id.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { MemoryRecord } from "../memory/schema.js";
import { formatMemoryContext, type MemoryStore } from "../memory/store.js";
import { ReasoningStage, type ReasoningPredictor } from "../reasoning/predictor.js";
import { formatPassages, type DocumentRetriever } from "../retrieval/retriever.js";
import type { RetrievalChunk } from "../retrieval/types.js";
import { bindSpecIdentity } from "../specification/factory.js";
import type { ExperimentSpec, NoveltyVerdict } from "../specification/schema.js";
import type { SpecSink } from "../specification/serialization.js";
import { StageStatus, type PipelineStageName, type RunStatus } from "../types/pipeline.js";
import { failureRecord, verdictRecord } from "./records.js";
import { AgentState, StateError } from "./state.js";
import { truncatePassages, truncateUnits } from "./truncate.js";

export interface PipelineDependencies {
  predictor: ReasoningPredictor;
  literature: LiteratureSource;
  retriever: DocumentRetriever;
  memory: MemoryStore;
  sink: SpecSink;
  logger?: Logger;
  /** Run ID generator; defaults to `mof-YYYYMMDD-HHMMSSmmm-<hex>` */
  runId?: () => string;
  now?: () => Date;
}

export interface RunResult {
  status: RunStatus;
  runId: string;
  state: AgentState;
  /** Predictor calls issued during the run */
  reasoningCalls: number;
  novelty?: NoveltyVerdict;
  spec?: ExperimentSpec;
  specPath?: string;
  /** False when the closing memory append failed */
  memoryRecorded: boolean;
  error?: Error;
}

export class PipelineInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineInputError";
  }
}

export class PipelineController {
  readonly policy: ModePolicy;
  private readonly logger: Logger;
  private readonly nextRunId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly config: AgentConfig,
    private readonly deps: PipelineDependencies
  ) {
    this.policy = resolveModePolicy(config);
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.nextRunId = deps.runId ?? (() => generateRunId(undefined, this.now()));
  }

  /**
   * Execute one run to a terminal state.
   *
   * @throws PipelineInputError if the query is blank
   * @throws StateError on a state ordering violation
   */
  async run(rawQuery: string): Promise<RunResult> {
    const query = rawQuery.trim();
    if (!query) {
      throw new PipelineInputError("Query must not be empty");
    }

    const state = new AgentState({ rawQuery: query, runId: this.nextRunId(), mode: this.policy.mode });
    const log = this.logger.child(state.runId);
    const stage = new ReasoningStage(this.deps.predictor, { logger: log });

    log.info("Run started", { mode: state.mode, query });

    try {
      await this.step(state, "init", () => this.init(state, log));

      await this.step(state, "intent", async () => {
        state.set(
          "intent",
          await stage.run("intent", { query, memoryContext: state.get("memoryContext") })
        );
      });

      await this.step(state, "canonicalize", async () => {
        state.set(
          "canonical",
          await stage.run("canonicalize", {
            query,
            intent: state.get("intent"),
            memoryContext: state.get("memoryContext"),
          })
        );
      });

      await this.step(state, "retrieve", () => this.retrieve(state, log));

      const novelty = await this.novelty(state, stage);
      log.info("Novelty verdict", { status: novelty.status, references: novelty.references.length });

      if (novelty.status === "reject") {
        const memoryRecorded = await this.remember(verdictRecord(state, novelty, this.now()), log);
        log.info("Run finished", { status: "rejected" });
        return {
          status: "rejected",
          runId: state.runId,
          state,
          reasoningCalls: stage.callCount,
          novelty,
          memoryRecorded,
        };
      }

      let specPath = "";
      await this.step(state, "spec", async () => {
        const predicted = await stage.run("spec", {
          query,
          canonicalQuery: state.get("canonical").query,
          memoryContext: state.get("memoryContext"),
          novelty,
          runId: state.runId,
        });
        const spec = bindSpecIdentity(predicted, {
          runId: state.runId,
          queryOriginal: query,
          queryCanonical: state.get("canonical").query,
          novelty,
        });
        state.set("spec", spec);
        specPath = await this.deps.sink.write(state.runId, spec);
      });

      const memoryRecorded = await this.remember(verdictRecord(state, novelty, this.now()), log);
      log.info("Run finished", { status: "spec_written", specPath });
      return {
        status: "spec_written",
        runId: state.runId,
        state,
        reasoningCalls: stage.callCount,
        novelty,
        spec: state.get("spec"),
        specPath,
        memoryRecorded,
      };
    } catch (err) {
      if (err instanceof StateError) {
        throw err;
      }
      const error = err instanceof Error ? err : new Error(String(err));
      log.error("Run failed", { error: error.message, errorType: error.name });

      const memoryRecorded = await this.remember(failureRecord(state, error, this.now()), log);
      return {
        status: "failed",
        runId: state.runId,
        state,
        reasoningCalls: stage.callCount,
        novelty: state.peek("novelty"),
        memoryRecorded,
        error,
      };
    }
  }

  private async step(state: AgentState, name: PipelineStageName, body: () => Promise<void>): Promise<void> {
    state.beginStage(name, this.now());
    try {
      await body();
    } catch (err) {
      state.endStage(name, StageStatus.Failed, err instanceof Error ? err.message : String(err), this.now());
      throw err;
    }
    state.endStage(name, StageStatus.Completed, undefined, this.now());
  }

  private async init(state: AgentState, log: Logger): Promise<void> {
    let records: MemoryRecord[] = [];
    try {
      records = await this.deps.memory.topK(state.rawQuery, this.policy.memoryK);
    } catch (err) {
      log.warn("Memory unavailable, continuing without it", {
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const context = formatMemoryContext(records, this.policy.memoryContextChars);
    log.debug("Memory context ready", { records: records.length, chars: context.length });
    state.set("memoryContext", context);
  }

  private async retrieve(state: AgentState, log: Logger): Promise<void> {
    const canonical = state.get("canonical").query;

    const [literature, passages] = await Promise.all([
      this.fetchLiterature(canonical, log),
      this.searchLocal(canonical, log),
    ]);

    state.set("literature", literature);
    state.set("localContext", passages);
  }

  private async fetchLiterature(canonical: string, log: Logger): Promise<string> {
    if (!this.policy.literatureEnabled) {
      return "";
    }

    try {
      const topic = clipQuery(canonical, this.config.literature.queryMaxChars);
      const docs = await this.deps.literature.fetch(topic, this.policy.literatureMaxDocs);
      const truncated = truncateUnits(
        toLiteratureUnits(docs),
        this.policy.charCaps.literature,
        LITERATURE_UNIT_SEPARATOR
      );
      log.debug("Literature retrieved", { documents: docs.length, kept: truncated.kept });
      return truncated.text;
    } catch (err) {
      log.warn("Literature fetch failed, continuing without it", {
        error: err instanceof Error ? err.message : String(err),
      });
      return "";
    }
  }

  private async searchLocal(canonical: string, log: Logger): Promise<RetrievalChunk[]> {
    const { documentsDir, topN } = this.config.retrieval;
    try {
      const ranked = await this.deps.retriever.retrieve(canonical, documentsDir, topN);
      const kept = truncatePassages(ranked, this.policy.charCaps.local);
      log.debug("Local passages retrieved", { matched: ranked.length, kept: kept.length });
      return kept;
    } catch (err) {
      log.warn("Local retrieval failed, continuing without it", {
        directory: documentsDir,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  private async novelty(state: AgentState, stage: ReasoningStage): Promise<NoveltyVerdict> {
    if (!this.policy.noveltyEnabled) {
      state.beginStage("novelty", this.now());
      state.set("novelty", { status: "pass", rationale: FAST_MODE_RATIONALE, references: [] });
      state.endStage("novelty", StageStatus.Skipped, undefined, this.now());
      return state.get("novelty");
    }

    await this.step(state, "novelty", async () => {
      state.set(
        "novelty",
        await stage.run("novelty", {
          canonicalQuery: state.get("canonical").query,
          memoryContext: state.get("memoryContext"),
          literature: state.get("literature"),
          localContext: formatPassages(state.get("localContext")),
        })
      );
    });
    return state.get("novelty");
  }

  private async remember(record: MemoryRecord, log: Logger): Promise<boolean> {
    try {
      await this.deps.memory.append(record);
      return true;
    } catch (err) {
      log.error("Failed to record run in memory", {
        verdict: record.verdict,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
