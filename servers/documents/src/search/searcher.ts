/**
 * Queries a loaded index with prefix and fuzzy matching.
 */

import { extname } from "node:path";
import { ToolInputError, type Logger } from "../../../../src/index.js";
import type { IndexManager } from "./index-manager.js";
import type { IndexedDocument, SearchHit, SearchOptions, SearchResponse } from "./types.js";

export const DEFAULT_MAX_RESULTS = 50;
const SNIPPET_WIDTH = 150;
const MAX_SNIPPETS = 3;

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Up to three windows of about 150 characters around the matched terms,
 * with each term wrapped in `**`.
 */
export function buildSnippets(content: string, terms: string[], max = MAX_SNIPPETS, width = SNIPPET_WIDTH): string[] {
  const unique = [...new Set(terms.map((t) => t.toLowerCase()).filter((t) => t.length > 0))];
  if (unique.length === 0 || content.length === 0) return [];
  const pattern = new RegExp(unique.sort((a, b) => b.length - a.length).map(escapeRegex).join("|"), "gi");

  const windows: Array<[number, number]> = [];
  for (const match of content.matchAll(pattern)) {
    const at = match.index ?? 0;
    const start = Math.max(0, at - Math.floor((width - match[0].length) / 2));
    const end = Math.min(content.length, start + width);
    const previous = windows[windows.length - 1];
    if (previous && start <= previous[1]) continue;
    windows.push([start, end]);
    if (windows.length >= max) break;
  }

  return windows.map(([start, end]) => {
    const text = content.slice(start, end).replace(/\s+/g, " ").trim();
    const highlighted = text.replace(pattern, (term) => `**${term}**`);
    return `${start > 0 ? "..." : ""}${highlighted}${end < content.length ? "..." : ""}`;
  });
}

function matchesType(doc: IndexedDocument, fileTypes: string[]): boolean {
  const extension = extname(doc.filePath).toLowerCase();
  return fileTypes.some((type) => {
    const wanted = type.toLowerCase();
    return wanted === doc.documentType || wanted === extension || `.${wanted}` === extension;
  });
}

function compareHits(sortBy: SearchOptions["sortBy"]): (a: SearchHit, b: SearchHit) => number {
  switch (sortBy) {
    case "date":
      return (a, b) => Date.parse(a.modifiedDate) - Date.parse(b.modifiedDate);
    case "size":
      return (a, b) => a.fileSizeBytes - b.fileSizeBytes;
    case "name":
      return (a, b) => a.fileName.localeCompare(b.fileName);
    default:
      return (a, b) => a.relevanceScore - b.relevanceScore;
  }
}

export class DocumentSearcher {
  private readonly indexes: IndexManager;
  private readonly logger: Logger;

  constructor(options: { indexes: IndexManager; logger: Logger }) {
    this.indexes = options.indexes;
    this.logger = options.logger;
  }

  async search(indexName: string, query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const trimmed = query.trim();
    if (!trimmed) throw new ToolInputError("query must not be empty", { field: "query" });
    const started = Date.now();
    const index = await this.indexes.getIndex(indexName);

    const fileTypes = options.fileTypes ?? [];
    const hits: SearchHit[] = [];
    for (const result of index.engine.search(trimmed)) {
      const doc = index.document(String(result.id));
      if (!doc) continue;
      if (fileTypes.length > 0 && !matchesType(doc, fileTypes)) continue;
      const modified = Date.parse(doc.modified);
      if (options.startDate && modified < options.startDate.getTime()) continue;
      if (options.endDate && modified > options.endDate.getTime()) continue;
      hits.push({
        filePath: doc.filePath,
        fileName: doc.fileName,
        title: doc.title,
        documentType: doc.documentType,
        relevanceScore: Math.round(result.score * 1000) / 1000,
        snippets: options.includeSnippets === false ? [] : buildSnippets(doc.content, result.terms),
        modifiedDate: doc.modified,
        fileSizeBytes: doc.fileSize,
      });
    }

    const compare = compareHits(options.sortBy);
    // relevance is best-first unless asked otherwise; other orders are ascending unless asked otherwise
    const descending = options.sortDescending ?? (options.sortBy === undefined || options.sortBy === "relevance");
    hits.sort((a, b) => (descending ? compare(b, a) : compare(a, b)));

    const results = hits.slice(0, options.maxResults ?? DEFAULT_MAX_RESULTS);
    const searchTimeMs = Date.now() - started;
    this.logger.debug(`Searched ${indexName}`, { query: trimmed, hits: hits.length, searchTimeMs });
    return { indexName, query: trimmed, totalHits: hits.length, resultCount: results.length, searchTimeMs, results };
  }

  /** Terms the query splits into, as the index tokenizes them. */
  static queryTerms(query: string): string[] {
    return query
      .toLowerCase()
      .split(/[\s\p{P}]+/u)
      .filter((term) => term.length > 0);
  }
}
