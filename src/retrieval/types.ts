/**
 * Local retrieval types.
 */

/**
 * A scored window of a source document. Created per search, never persisted.
 */
export interface RetrievalChunk {
  /** File name of the source document */
  readonly source: string;
  /** 1-based page number for paginated documents, otherwise null */
  readonly page: number | null;
  /** Start offset (inclusive) into the page or document text */
  readonly start: number;
  /** End offset (exclusive) into the page or document text */
  readonly end: number;
  readonly text: string;
  /** Relevance; higher is more relevant */
  readonly score: number;
  /** Position of the source document in the index */
  readonly documentOrder: number;
  /** Position of the chunk within its document */
  readonly chunkOrder: number;
}

/**
 * Chunk as stored in the index, with its token set precomputed so a search
 * is a single pass.
 */
export interface IndexedChunk extends Omit<RetrievalChunk, "score"> {
  readonly tokens: ReadonlySet<string>;
}

export interface IndexedDocument {
  readonly source: string;
  readonly path: string;
  readonly chunkCount: number;
}

/**
 * In-memory index of one directory snapshot.
 */
export interface DocumentIndex {
  readonly directory: string;
  readonly documents: readonly IndexedDocument[];
  readonly chunks: readonly IndexedChunk[];
  /** Documents that could not be read */
  readonly skipped: readonly string[];
}

/**
 * Extracts the text of one document, one entry per page.
 */
export type TextExtractor = (filePath: string) => Promise<string[]>;
