/**
 * Remote literature search.
 */

export {
  ArxivLiteratureSource,
  parseArxivFeed,
  arxivIdFromUrl,
  ARXIV_API_URL,
  type ArxivSourceOptions,
} from "./arxiv.js";
export {
  toLiteratureUnit,
  toLiteratureUnits,
  clipQuery,
  LITERATURE_UNIT_SEPARATOR,
} from "./compact.js";
export {
  LiteratureFetchError,
  type LiteratureDocument,
  type LiteratureSource,
} from "./types.js";
