/**
 * PDF text through pdfjs-dist. The legacy build runs on Node 20 without a worker.
 */

import { readFile } from "node:fs/promises";
import { errorName, isRecord } from "../../../../src/index.js";
import { DocumentError } from "../errors.js";
import type { PageText } from "../types.js";

const NEED_PASSWORD = 1;
const INCORRECT_PASSWORD = 2;

export type PdfContent = {
  pages: PageText[];
  pageCount: number;
  title?: string;
};

export type PdfReadOptions = {
  password?: string;
  /** Read at most this many pages from the start. */
  maxPages?: number;
};

type TextPart = { str: string; hasEOL?: boolean };

function isTextPart(item: unknown): item is TextPart {
  return isRecord(item) && typeof item.str === "string";
}

/** Join pdfjs text items into lines with single spaces. */
export function joinTextItems(items: unknown[]): string {
  const parts: string[] = [];
  for (const item of items) {
    if (!isTextPart(item)) continue;
    parts.push(item.str);
    if (item.hasEOL) parts.push("\n");
  }
  return parts
    .join(" ")
    .split("\n")
    .map((line) => line.replace(/[ \t]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

function passwordError(error: unknown, filePath: string, password?: string): DocumentError | undefined {
  if (errorName(error) !== "PasswordException" || !isRecord(error)) return undefined;
  if (error.code === INCORRECT_PASSWORD || (error.code === NEED_PASSWORD && password)) {
    return new DocumentError("INCORRECT_PASSWORD", `The password for ${filePath} is incorrect`, filePath);
  }
  return new DocumentError("PASSWORD_REQUIRED", `${filePath} is password protected`, filePath);
}

export async function readPdf(filePath: string, options: PdfReadOptions = {}): Promise<PdfContent> {
  const data = new Uint8Array(await readFile(filePath));
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

  const task = getDocument({ data, password: options.password, isEvalSupported: false, verbosity: 0 });
  const pdf = await task.promise.catch((error: unknown) => {
    throw passwordError(error, filePath, options.password) ?? error;
  });

  try {
    const pageCount = pdf.numPages;
    const last = Math.min(pageCount, options.maxPages ?? pageCount);
    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= last; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      pages.push({ pageNumber, text: joinTextItems(content.items) });
      page.cleanup();
    }

    const meta = await pdf.getMetadata();
    const info: unknown = meta.info;
    const title = isRecord(info) && typeof info.Title === "string" && info.Title.trim() ? info.Title.trim() : undefined;
    return { pages, pageCount, title };
  } finally {
    await pdf.destroy();
  }
}
