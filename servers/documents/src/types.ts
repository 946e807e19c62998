/**
 * Types shared by the document tools.
 */

export const DOCUMENT_TYPES = ["text", "markdown", "log", "csv", "json", "xml", "html", "pdf", "docx", "xlsx"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const EXTENSION_TYPES: Readonly<Record<string, DocumentType>> = {
  ".txt": "text",
  ".md": "markdown",
  ".log": "log",
  ".csv": "csv",
  ".json": "json",
  ".xml": "xml",
  ".html": "html",
  ".htm": "html",
  ".pdf": "pdf",
  ".docx": "docx",
  ".xlsx": "xlsx",
  ".xls": "xlsx",
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_TYPES);

export type PageText = {
  pageNumber: number;
  text: string;
};

export type DocumentMetadata = {
  fileSize: number;
  modified: string;
  pageCount?: number;
  sheetNames?: string[];
  wordCount: number;
  characterCount: number;
};

export type ExtractedDocument = {
  filePath: string;
  documentType: DocumentType;
  text: string;
  pages?: PageText[];
  title: string;
  metadata: DocumentMetadata;
  warnings: string[];
};

export type ExtractOptions = {
  password?: string;
};

/** What a document cache entry reports without its text. */
export type DocumentSummary = {
  filePath: string;
  documentType: DocumentType;
  title: string;
  characterCount: number;
  pageCount?: number;
  estimatedBytes: number;
  loadedAt: string;
  lastAccessedAt: string;
  accessCount: number;
};
