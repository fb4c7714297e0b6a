/**
 * Local document retriever.
 *
 * Builds a fresh in-memory index of a directory on every index() call, so
 * documents added or removed between runs are always seen. No embedding
 * model is involved: passages are ranked by lexical overlap.
 *
 * USAGE:
 *
 *   const retriever = new DocumentRetriever({ chunkSize: 1500, chunkOverlap: 200 });
 *   const index = await retriever.index("local_pdfs");
 *   const passages = retriever.search("UiO-66 relaxation", index, 5);
 */

import { join } from "node:path";
import { chunkText } from "./chunker.js";
import { DEFAULT_EXTRACTORS, documentKind, listDocuments, type DocumentKind } from "./documents.js";
import { scoreChunk, tokenizeWords } from "./scoring.js";
import type {
  DocumentIndex,
  IndexedChunk,
  IndexedDocument,
  RetrievalChunk,
  TextExtractor,
} from "./types.js";
import { silentLogger, type Logger } from "../logging/index.js";

export interface DocumentRetrieverOptions {
  chunkSize: number;
  chunkOverlap: number;
  logger?: Logger;
  /** Override text extraction per document kind */
  extractors?: Partial<Record<DocumentKind, TextExtractor>>;
}

export class DocumentRetriever {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly logger: Logger;
  private readonly extractors: Record<DocumentKind, TextExtractor>;

  constructor(options: DocumentRetrieverOptions) {
    if (options.chunkOverlap >= options.chunkSize) {
      throw new RangeError(
        `chunkOverlap (${options.chunkOverlap}) must be smaller than chunkSize (${options.chunkSize})`
      );
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.logger = options.logger ?? silentLogger;
    this.extractors = { ...DEFAULT_EXTRACTORS, ...options.extractors };
  }

  /**
   * Index every supported document in the directory.
   * A missing directory yields an empty index; unreadable documents are
   * skipped with a warning.
   */
  async index(directory: string): Promise<DocumentIndex> {
    const fileNames = await listDocuments(directory);
    const documents: IndexedDocument[] = [];
    const chunks: IndexedChunk[] = [];
    const skipped: string[] = [];

    for (const fileName of fileNames) {
      const kind = documentKind(fileName);
      if (!kind) continue;

      const path = join(directory, fileName);
      let pages: string[];
      try {
        pages = await this.extractors[kind](path);
      } catch (err) {
        this.logger.warn("Skipping unreadable document", {
          path,
          error: err instanceof Error ? err.message : String(err),
        });
        skipped.push(fileName);
        continue;
      }

      const documentOrder = documents.length;
      let chunkOrder = 0;

      for (let p = 0; p < pages.length; p++) {
        const text = pages[p];
        if (!text.trim()) continue;

        for (const window of chunkText(text, this.chunkSize, this.chunkOverlap)) {
          chunks.push({
            source: fileName,
            page: kind === "pdf" ? p + 1 : null,
            start: window.start,
            end: window.end,
            text: window.text,
            documentOrder,
            chunkOrder: chunkOrder++,
            tokens: new Set(tokenizeWords(window.text)),
          });
        }
      }

      documents.push({ source: fileName, path, chunkCount: chunkOrder });
    }

    this.logger.debug("Indexed local documents", {
      directory,
      documents: documents.length,
      chunks: chunks.length,
      skipped: skipped.length,
    });

    return { directory, documents, chunks, skipped };
  }

  /**
   * Rank chunks against the query in one pass over the index.
   *
   * Chunks sharing no token with the query are dropped. Ordering is by
   * score, then document order, then chunk order.
   */
  search(query: string, index: DocumentIndex, topN: number): RetrievalChunk[] {
    const queryTokens = new Set(tokenizeWords(query));
    if (topN <= 0 || queryTokens.size === 0 || index.chunks.length === 0) {
      return [];
    }

    const scored: RetrievalChunk[] = [];
    for (const chunk of index.chunks) {
      const score = scoreChunk(queryTokens, chunk.tokens);
      if (score > 0) {
        const { tokens: _tokens, ...rest } = chunk;
        scored.push({ ...rest, score });
      }
    }

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        a.documentOrder - b.documentOrder ||
        a.chunkOrder - b.chunkOrder
    );

    return scored.slice(0, topN);
  }

  /**
   * Index a directory and search it.
   */
  async retrieve(query: string, directory: string, topN: number): Promise<RetrievalChunk[]> {
    const index = await this.index(directory);
    return this.search(query, index, topN);
  }
}

/**
 * Label a passage with its source location.
 */
export function passageLabel(chunk: RetrievalChunk): string {
  return chunk.page !== null ? `[${chunk.source} p.${chunk.page}]` : `[${chunk.source}]`;
}

/**
 * Render one passage for a prompt.
 */
export function formatPassage(chunk: RetrievalChunk): string {
  return `${passageLabel(chunk)} ${chunk.text}`;
}

/**
 * Render ranked passages for a prompt, best first.
 */
export function formatPassages(chunks: readonly RetrievalChunk[]): string {
  return chunks.map(formatPassage).join("\n\n");
}
