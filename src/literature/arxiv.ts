/**
 * arXiv client.
 *
 * Queries the public Atom API and parses the feed into LiteratureDocuments.
 * arXiv answers 429 when rate limited and 5xx under load; both surface as
 * LiteratureFetchError, as do timeouts and network failures.
 */

import { parse, type HTMLElement } from "node-html-parser";
import { LiteratureFetchError, type LiteratureDocument, type LiteratureSource } from "./types.js";
import { silentLogger, type Logger } from "../logging/index.js";

export const ARXIV_API_URL = "https://export.arxiv.org/api/query";

export interface ArxivSourceOptions {
  timeoutMs: number;
  endpoint?: string;
  logger?: Logger;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function childText(entry: HTMLElement, selector: string): string {
  return normalizeWhitespace(entry.querySelector(selector)?.text ?? "");
}

/**
 * Extract the short arXiv identifier from an abstract URL.
 */
export function arxivIdFromUrl(url: string): string {
  const match = url.match(/arxiv\.org\/abs\/(.+)$/);
  return match ? match[1] : url;
}

/**
 * Parse an arXiv Atom feed. Entries without an id or title are ignored.
 */
export function parseArxivFeed(xml: string): LiteratureDocument[] {
  const root = parse(xml);
  const documents: LiteratureDocument[] = [];

  for (const entry of root.querySelectorAll("entry")) {
    const url = childText(entry, "id");
    const title = childText(entry, "title");
    if (!url || !title) continue;

    const published = childText(entry, "published");
    documents.push({
      id: arxivIdFromUrl(url),
      title,
      summary: childText(entry, "summary"),
      published: published || undefined,
      authors: entry
        .querySelectorAll("author name")
        .map((name) => normalizeWhitespace(name.text))
        .filter((name) => name.length > 0),
      url,
    });
  }

  return documents;
}

export class ArxivLiteratureSource implements LiteratureSource {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ArxivSourceOptions) {
    this.endpoint = options.endpoint ?? ARXIV_API_URL;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  buildUrl(topic: string, maxDocs: number): string {
    const url = new URL(this.endpoint);
    url.searchParams.set("search_query", `all:${topic}`);
    url.searchParams.set("start", "0");
    url.searchParams.set("max_results", String(maxDocs));
    return url.toString();
  }

  async fetch(topic: string, maxDocs: number): Promise<LiteratureDocument[]> {
    if (maxDocs <= 0 || !topic.trim()) {
      return [];
    }

    const url = this.buildUrl(topic, maxDocs);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/atom+xml" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new LiteratureFetchError(
        `arXiv request failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (!response.ok) {
      throw new LiteratureFetchError(
        `arXiv responded with HTTP ${response.status}`,
        response.status
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      throw new LiteratureFetchError(
        `arXiv response could not be read: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const documents = parseArxivFeed(body).slice(0, maxDocs);
    this.logger.debug("arXiv documents fetched", { topic, count: documents.length });
    return documents;
  }
}
