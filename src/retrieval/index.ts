/**
 * Local document retrieval (chunking and lexical ranking).
 */

export {
  DocumentRetriever,
  formatPassage,
  formatPassages,
  passageLabel,
  type DocumentRetrieverOptions,
} from "./retriever.js";
export { chunkText, type TextWindow } from "./chunker.js";
export { scoreChunk, tokenizeWords } from "./scoring.js";
export {
  listDocuments,
  documentKind,
  extractPdfPages,
  extractPlainText,
  readReleasable,
  DEFAULT_EXTRACTORS,
  type ReleasableDocument,
  type DocumentKind,
} from "./documents.js";
export type {
  RetrievalChunk,
  IndexedChunk,
  IndexedDocument,
  DocumentIndex,
  TextExtractor,
} from "./types.js";
