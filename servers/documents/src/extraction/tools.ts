/**
 * Loading, extraction and comparison tools.
 */

import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { Type } from "@sinclair/typebox";
import { ToolInputError, defineTool, errorCode, errorMessage, type ToolDefinition } from "../../../../src/index.js";
import { DocumentError } from "../errors.js";
import { FilePath, Password } from "../params.js";
import type { DocumentServerState } from "../state.js";
import type { DocumentType, ExtractedDocument } from "../types.js";
import { compareTexts } from "./compare.js";
import { documentTypeOf } from "./extractor.js";

const SERVICE = "documents";

type ValidationReport = {
  filePath: string;
  exists: boolean;
  supported: boolean;
  documentType?: DocumentType;
  readable: boolean;
  passwordRequired: boolean;
  hasRegisteredPassword: boolean;
  fileSize?: number;
  error?: string;
};
const DEFAULT_MAX_LENGTH = 50_000;

function describeDocument(document: ExtractedDocument) {
  return {
    filePath: document.filePath,
    documentType: document.documentType,
    title: document.title,
    metadata: document.metadata,
    warnings: document.warnings,
  };
}

/** Text of the requested page range, or all of it. */
export function selectPages(
  document: ExtractedDocument,
  startPage?: number,
  endPage?: number,
): { text: string; pageRange?: { start: number; end: number } } {
  if (startPage === undefined && endPage === undefined) return { text: document.text };
  const pages = document.pages;
  if (!pages) {
    throw new ToolInputError("startPage and endPage only apply to PDF documents", { field: "startPage" });
  }
  const start = startPage ?? 1;
  const end = endPage ?? pages.length;
  if (start < 1 || end < start || end > pages.length) {
    throw new ToolInputError(`Page range ${start}-${end} is outside 1-${pages.length}`, { field: "startPage" });
  }
  const text = pages
    .filter((page) => page.pageNumber >= start && page.pageNumber <= end)
    .map((page) => page.text)
    .join("\n\n");
  return { text, pageRange: { start, end } };
}

export function createDocumentTools(state: DocumentServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "doc_load_document",
      label: "Load Document",
      description: "Extract a document and keep it in the cache. Supports txt, md, log, csv, json, xml, html, pdf, docx and xlsx.",
      service: SERVICE,
      parameters: Type.Object({
        filePath: FilePath(),
        password: Password,
        forceReload: Type.Boolean({ default: false }),
      }),
      async run(params) {
        const loaded = await state.loadDocument(params.filePath, { password: params.password, reload: params.forceReload });
        return {
          ...describeDocument(loaded.document),
          fromCache: loaded.fromCache,
          evicted: loaded.evicted,
          cachedDocuments: state.cache.size,
        };
      },
    }),

    defineTool({
      name: "doc_unload_document",
      label: "Unload Document",
      description: "Remove a document from the cache.",
      service: SERVICE,
      parameters: Type.Object({ filePath: FilePath() }),
      async run(params) {
        const unloaded = state.cache.remove(params.filePath);
        return { filePath: resolve(params.filePath), unloaded };
      },
    }),

    defineTool({
      name: "doc_list_documents",
      label: "List Documents",
      description: "Cached documents, most recently used first.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const documents = state.cache.list();
        return { documents, count: documents.length, statistics: state.cache.statistics() };
      },
    }),

    defineTool({
      name: "doc_extract_content",
      label: "Extract Content",
      description: "Text of a document, optionally a page range of a PDF, truncated to maxLength characters.",
      service: SERVICE,
      parameters: Type.Object({
        filePath: FilePath(),
        password: Password,
        startPage: Type.Optional(Type.Integer({ minimum: 1 })),
        endPage: Type.Optional(Type.Integer({ minimum: 1 })),
        maxLength: Type.Integer({ minimum: 1, default: DEFAULT_MAX_LENGTH }),
      }),
      async run(params) {
        const { document } = await state.loadDocument(params.filePath, { password: params.password });
        const { text, pageRange } = selectPages(document, params.startPage, params.endPage);
        const truncated = text.length > params.maxLength;
        return {
          filePath: document.filePath,
          documentType: document.documentType,
          content: truncated ? text.slice(0, params.maxLength) : text,
          length: Math.min(text.length, params.maxLength),
          totalLength: text.length,
          truncated,
          pageRange,
          pageCount: document.metadata.pageCount,
        };
      },
    }),

    defineTool({
      name: "doc_get_metadata",
      label: "Get Document Metadata",
      description: "Type, title, size, dates, page and word counts of a document.",
      service: SERVICE,
      parameters: Type.Object({ filePath: FilePath(), password: Password }),
      async run(params) {
        const { document } = await state.loadDocument(params.filePath, { password: params.password });
        return describeDocument(document);
      },
    }),

    defineTool({
      name: "doc_validate_document",
      label: "Validate Document",
      description: "Whether a file exists, is a supported type, can be read, and needs a password.",
      service: SERVICE,
      parameters: Type.Object({ filePath: FilePath(), password: Password }),
      async run(params) {
        const filePath = resolve(params.filePath);
        const documentType = documentTypeOf(filePath);
        const hasRegisteredPassword = state.passwords.hasPassword(filePath);
        const report: ValidationReport = {
          filePath,
          exists: false,
          supported: documentType !== undefined,
          documentType,
          readable: false,
          passwordRequired: false,
          hasRegisteredPassword,
        };

        try {
          const info = await stat(filePath);
          report.exists = info.isFile();
          report.fileSize = info.size;
          if (!info.isFile()) report.error = "Path is a directory";
        } catch (error) {
          report.error = errorCode(error) === "ENOENT" ? "File not found" : errorMessage(error);
        }

        if (report.exists && report.supported) {
          try {
            await state.extractor.extract(filePath, { password: params.password });
            report.readable = true;
          } catch (error) {
            if (error instanceof DocumentError && (error.code === "PASSWORD_REQUIRED" || error.code === "INCORRECT_PASSWORD")) {
              report.passwordRequired = true;
            }
            report.error = errorMessage(error);
          }
        } else if (report.exists) {
          report.error = "Unsupported file type";
        }

        return { ...report, valid: report.exists && report.supported && report.readable };
      },
    }),

    defineTool({
      name: "doc_compare_documents",
      label: "Compare Documents",
      description: "Line and word level comparison of two documents with the first differing lines.",
      service: SERVICE,
      parameters: Type.Object({
        filePathA: FilePath("First document"),
        filePathB: FilePath("Second document"),
        passwordA: Type.Optional(Type.String()),
        passwordB: Type.Optional(Type.String()),
      }),
      async run(params) {
        const a = await state.loadDocument(params.filePathA, { password: params.passwordA });
        const b = await state.loadDocument(params.filePathB, { password: params.passwordB });
        return {
          filePathA: a.document.filePath,
          filePathB: b.document.filePath,
          comparison: compareTexts(a.document.text, b.document.text),
        };
      },
    }),

    defineTool({
      name: "doc_clear_cache",
      label: "Clear Document Cache",
      description: "Drop every cached document.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        return { cleared: state.cache.clear() };
      },
    }),

    defineTool({
      name: "doc_get_status",
      label: "Document Server Status",
      description: "Cache usage, indexes, registered passwords and OCR availability.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const names = state.indexes.getIndexNames();
        return {
          dataDirectory: state.config.dataDirectory,
          cache: state.cache.statistics(),
          indexes: {
            discovered: names.length,
            loaded: names.filter((name) => state.indexes.isLoaded(name)).length,
            names,
          },
          passwords: state.passwords.stats(),
          ocr: await state.ocr.status(),
        };
      },
    }),
  ];
}
