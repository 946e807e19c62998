import { Type, type Static } from "@sinclair/typebox";
import { DOCUMENT_TYPES } from "../types.js";
import { stringEnum } from "../../../../src/index.js";

export const INDEX_FORMAT_VERSION = 1;

export const IndexedDocumentSchema = Type.Object({
  id: Type.String(),
  content: Type.String(),
  filePath: Type.String(),
  fileName: Type.String(),
  title: Type.String(),
  documentType: stringEnum(DOCUMENT_TYPES),
  modified: Type.String(),
  fileSize: Type.Number(),
});

export type IndexedDocument = Static<typeof IndexedDocumentSchema>;

/** On-disk form of an index: `<dataDirectory>/indexes/<name>.json`. */
export const IndexFileSchema = Type.Object({
  version: Type.Literal(INDEX_FORMAT_VERSION),
  name: Type.String(),
  rootPath: Type.String(),
  createdAt: Type.String(),
  updatedAt: Type.String(),
  documents: Type.Array(IndexedDocumentSchema),
});

export type IndexFile = Static<typeof IndexFileSchema>;

export type IndexMemoryStatus = {
  indexName: string;
  isDiscovered: boolean;
  isLoadedInMemory: boolean;
  estimatedMemoryUsageMb: number;
};

export type IndexFailure = { filePath: string; error: string };

export type IndexBuildResult = {
  indexName: string;
  rootPath: string;
  startTime: string;
  endTime: string;
  durationMs: number;
  totalDocuments: number;
  indexedDocuments: number;
  failedDocuments: number;
  failures: IndexFailure[];
};

export const SORT_FIELDS = ["relevance", "date", "size", "name"] as const;

export type SortField = (typeof SORT_FIELDS)[number];

export type SearchOptions = {
  maxResults?: number;
  includeSnippets?: boolean;
  sortBy?: SortField;
  sortDescending?: boolean;
  /** Document types or extensions (pdf, .docx). */
  fileTypes?: string[];
  startDate?: Date;
  endDate?: Date;
};

export type SearchHit = {
  filePath: string;
  fileName: string;
  title: string;
  documentType: string;
  relevanceScore: number;
  snippets: string[];
  modifiedDate: string;
  fileSizeBytes: number;
};

export type SearchResponse = {
  indexName: string;
  query: string;
  totalHits: number;
  resultCount: number;
  searchTimeMs: number;
  results: SearchHit[];
};
