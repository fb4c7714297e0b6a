/**
 * Remote literature types.
 */

export interface LiteratureDocument {
  /** arXiv identifier, e.g. 2101.00001v1 */
  readonly id: string;
  readonly title: string;
  readonly summary: string;
  /** Publication date (ISO 8601) when provided by the feed */
  readonly published?: string;
  readonly authors: readonly string[];
  /** Abstract page URL */
  readonly url: string;
}

/**
 * A remote literature search. Implementations throw on any failure; the
 * pipeline decides how to recover.
 */
export interface LiteratureSource {
  fetch(topic: string, maxDocs: number): Promise<LiteratureDocument[]>;
}

export class LiteratureFetchError extends Error {
  constructor(
    message: string,
    /** HTTP status when the server answered */
    public readonly status?: number
  ) {
    super(message);
    this.name = "LiteratureFetchError";
  }
}
