/**
 * Run memory: persistence and similarity retrieval.
 */

export { MemoryRecordSchema, type MemoryRecord } from "./schema.js";
export { tokenize, recordTokens, jaccard } from "./similarity.js";
export {
  MemoryStore,
  MemoryStoreError,
  formatMemoryRecord,
  formatMemoryContext,
  NO_MEMORY_CONTEXT,
  type MemoryStoreOptions,
  type ScoredMemoryRecord,
} from "./store.js";
