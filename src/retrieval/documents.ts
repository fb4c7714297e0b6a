/**
 * Document discovery and text extraction.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import { extname } from "node:path";
import { extractText, getDocumentProxy } from "unpdf";
import type { TextExtractor } from "./types.js";

export type DocumentKind = "pdf" | "text";

/** File extensions recognized as documents. */
const DOCUMENT_EXTENSIONS: ReadonlyMap<string, DocumentKind> = new Map([
  [".pdf", "pdf"],
  [".txt", "text"],
  [".md", "text"],
]);

export function documentKind(fileName: string): DocumentKind | undefined {
  return DOCUMENT_EXTENSIONS.get(extname(fileName).toLowerCase());
}

/**
 * Supported document file names in a directory, sorted by name.
 * A missing directory has no documents.
 */
export async function listDocuments(directory: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return [];
    }
    throw err;
  }

  return entries
    .filter((entry) => entry.isFile() && documentKind(entry.name) !== undefined)
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * An opened document that holds resources until destroyed.
 */
export interface ReleasableDocument {
  destroy(): Promise<void>;
}

/**
 * Open a document, read its pages and release it, even when reading fails.
 */
export async function readReleasable<D extends ReleasableDocument>(
  open: () => Promise<D>,
  readPages: (doc: D) => Promise<string[]>
): Promise<string[]> {
  const doc = await open();
  try {
    return await readPages(doc);
  } finally {
    await doc.destroy();
  }
}

/**
 * Page texts of a PDF.
 */
export const extractPdfPages: TextExtractor = async (filePath) => {
  const buffer = await readFile(filePath);
  return readReleasable(
    () => getDocumentProxy(new Uint8Array(buffer)),
    async (pdf) => {
      const { text } = await extractText(pdf, { mergePages: false });
      return Array.isArray(text) ? text : [text];
    }
  );
};

/**
 * Plain text and markdown documents are a single page.
 */
export const extractPlainText: TextExtractor = async (filePath) => {
  return [await readFile(filePath, "utf-8")];
};

export const DEFAULT_EXTRACTORS: Readonly<Record<DocumentKind, TextExtractor>> = {
  pdf: extractPdfPages,
  text: extractPlainText,
};
