/**
 * Turns a supported file into text plus metadata.
 */

import { readFile, stat } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { ToolInputError, errorMessage, type Logger } from "../../../../src/index.js";
import { DocumentError } from "../errors.js";
import { EXTENSION_TYPES, SUPPORTED_EXTENSIONS, type DocumentType, type ExtractOptions, type ExtractedDocument, type PageText } from "../types.js";
import { readPdf } from "./pdf.js";

export type PasswordLookup = {
  getPassword(filePath: string): string | undefined;
};

type Extracted = {
  text: string;
  title?: string;
  pages?: PageText[];
  pageCount?: number;
  sheetNames?: string[];
  warnings: string[];
};

export function documentTypeOf(filePath: string): DocumentType | undefined {
  return EXTENSION_TYPES[extname(filePath).toLowerCase()];
}

export function isSupportedFile(filePath: string): boolean {
  return documentTypeOf(filePath) !== undefined;
}

/** Trim each line, collapse runs of spaces and of blank lines. */
export function normalizeText(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n").map((line) => line.replace(/[ \t\f\v]+/g, " ").trim());
  const result: string[] = [];
  for (const line of lines) {
    if (line === "" && (result.length === 0 || result[result.length - 1] === "")) continue;
    result.push(line);
  }
  while (result.length > 0 && result[result.length - 1] === "") result.pop();
  return result.join("\n");
}

export function countWords(text: string): number {
  const matches = text.match(/\S+/g);
  return matches ? matches.length : 0;
}

function markdownTitle(text: string): string | undefined {
  const heading = /^#\s+(.+)$/m.exec(text);
  return heading ? heading[1].trim() : undefined;
}

export async function htmlToText(html: string): Promise<{ text: string; title?: string }> {
  const { load } = await import("cheerio");
  const $ = load(html);
  const title = $("title").first().text().trim() || undefined;
  $("script, style, noscript, template, head").remove();
  $("br, p, div, li, tr, h1, h2, h3, h4, h5, h6, section, article, table").after("\n");
  return { text: normalizeText($.root().text()), title };
}

async function extractDocx(buffer: Buffer, filePath: string): Promise<Extracted> {
  const { extractRawText } = await import("mammoth");
  try {
    const result = await extractRawText({ buffer });
    return { text: normalizeText(result.value), warnings: result.messages.map((m) => `${m.type}: ${m.message}`) };
  } catch (error) {
    throw new DocumentError(
      "EXTRACTION_FAILED",
      `Cannot read ${filePath} as a Word document (encrypted Office files are not supported): ${errorMessage(error)}`,
      filePath,
    );
  }
}

function readWorkbook<T>(read: () => T, filePath: string): T {
  try {
    return read();
  } catch (error) {
    if (/password|encrypt/i.test(errorMessage(error))) {
      throw new DocumentError("PASSWORD_REQUIRED", `${filePath} is password protected`, filePath);
    }
    throw new DocumentError("EXTRACTION_FAILED", `Cannot read workbook ${filePath}: ${errorMessage(error)}`, filePath);
  }
}

async function extractWorkbook(buffer: Buffer, filePath: string, password?: string): Promise<Extracted> {
  const XLSX = await import("xlsx");
  const workbook = readWorkbook(() => XLSX.read(buffer, { type: "buffer", password, cellDates: true }), filePath);

  const warnings: string[] = [];
  const sections: string[] = [];
  for (const name of workbook.SheetNames) {
    const sheet = workbook.Sheets[name];
    if (!sheet) {
      warnings.push(`Sheet ${name} could not be read`);
      continue;
    }
    const csv = XLSX.utils.sheet_to_csv(sheet, { blankrows: false }).trim();
    if (!csv) warnings.push(`Sheet ${name} is empty`);
    sections.push(`## Sheet: ${name}\n${csv}`);
  }
  return { text: sections.join("\n\n"), sheetNames: [...workbook.SheetNames], warnings };
}

export class DocumentExtractor {
  private readonly passwords?: PasswordLookup;
  private readonly logger: Logger;

  constructor(options: { logger: Logger; passwords?: PasswordLookup }) {
    this.logger = options.logger;
    this.passwords = options.passwords;
  }

  /** The explicit password, else one registered for the file. */
  resolvePassword(filePath: string, password?: string): string | undefined {
    return password || this.passwords?.getPassword(filePath);
  }

  async extract(filePath: string, options: ExtractOptions = {}): Promise<ExtractedDocument> {
    const absolute = resolve(filePath);
    const documentType = documentTypeOf(absolute);
    if (!documentType) {
      throw new DocumentError(
        "UNSUPPORTED_TYPE",
        `Unsupported file type '${extname(absolute) || "(none)"}'; supported: ${SUPPORTED_EXTENSIONS.join(" ")}`,
        absolute,
      );
    }

    const info = await stat(absolute);
    if (!info.isFile()) throw new ToolInputError(`${absolute} is not a file`, { field: "filePath" });

    const started = Date.now();
    const extracted = await this.extractByType(absolute, documentType, this.resolvePassword(absolute, options.password));
    const text = extracted.text;
    this.logger.debug(`Extracted ${absolute}`, { documentType, characters: text.length, durationMs: Date.now() - started });

    return {
      filePath: absolute,
      documentType,
      text,
      pages: extracted.pages,
      title: extracted.title ?? basename(absolute, extname(absolute)),
      metadata: {
        fileSize: info.size,
        modified: info.mtime.toISOString(),
        pageCount: extracted.pageCount,
        sheetNames: extracted.sheetNames,
        wordCount: countWords(text),
        characterCount: text.length,
      },
      warnings: extracted.warnings,
    };
  }

  private async extractByType(filePath: string, type: DocumentType, password?: string): Promise<Extracted> {
    switch (type) {
      case "pdf": {
        const pdf = await readPdf(filePath, { password });
        const warnings = pdf.pages.filter((p) => p.text.length === 0).map((p) => `Page ${p.pageNumber} has no text layer`);
        return {
          text: pdf.pages.map((p) => p.text).filter((t) => t.length > 0).join("\n\n"),
          title: pdf.title,
          pages: pdf.pages,
          pageCount: pdf.pageCount,
          warnings,
        };
      }
      case "docx":
        return extractDocx(await readFile(filePath), filePath);
      case "xlsx":
        return extractWorkbook(await readFile(filePath), filePath, password);
      case "html": {
        const html = await htmlToText(await readText(filePath));
        return { text: html.text, title: html.title, warnings: [] };
      }
      case "markdown": {
        const text = await readText(filePath);
        return { text, title: markdownTitle(text), warnings: [] };
      }
      case "text":
      case "log":
      case "csv":
      case "json":
      case "xml":
        return { text: await readText(filePath), warnings: [] };
    }
  }
}

async function readText(filePath: string): Promise<string> {
  return (await readFile(filePath, "utf8")).replace(/^\uFEFF/, "");
}
