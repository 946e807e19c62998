/**
 * Index lifecycle and search tools.
 */

import { resolve } from "node:path";
import { Type } from "@sinclair/typebox";
import {
  NotFoundError,
  StringList,
  defineTool,
  parseOptionalDate,
  parseStringList,
  stringEnum,
  type ToolDefinition,
} from "../../../../src/index.js";
import { FilePath, IndexName } from "../params.js";
import type { DocumentServerState } from "../state.js";
import { DocumentSearcher } from "./searcher.js";
import { SORT_FIELDS } from "./types.js";

const SERVICE = "search";
const TEST_QUERY_RESULTS = 5;

export function createSearchTools(state: DocumentServerState): ToolDefinition[] {
  const requireIndex = (name: string) => {
    if (!state.indexes.indexExists(name)) throw new NotFoundError("Index", name, `Index '${name}' not found`);
  };

  return [
    defineTool({
      name: "doc_create_index",
      label: "Create Index",
      description: "Index the documents under a directory. An existing index of that name is extended; re-indexed files replace their old entries.",
      service: SERVICE,
      parameters: Type.Object({
        indexName: IndexName,
        rootPath: FilePath("Directory to index"),
        includePatterns: Type.Optional(StringList("Glob patterns such as *.pdf,*.docx; all supported types when omitted")),
        recursive: Type.Boolean({ default: true }),
      }),
      async run(params) {
        const result = await state.indexer.buildIndex({
          indexName: params.indexName,
          rootPath: params.rootPath,
          includePatterns: parseStringList(params.includePatterns, "includePatterns"),
          recursive: params.recursive,
        });
        return { ...result };
      },
    }),

    defineTool({
      name: "doc_list_indexes",
      label: "List Indexes",
      description: "Known indexes and whether each is loaded in memory.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const indexes = await state.indexes.getAllMemoryStatus();
        return { indexes, count: indexes.length, basePath: state.indexes.basePath };
      },
    }),

    defineTool({
      name: "doc_search_index",
      label: "Search Index",
      description: "Full-text search with prefix and fuzzy matching. Dates filter on file modification time.",
      service: SERVICE,
      parameters: Type.Object({
        indexName: IndexName,
        query: Type.String({ minLength: 1 }),
        maxResults: Type.Integer({ minimum: 1, maximum: 500, default: 50 }),
        includeSnippets: Type.Boolean({ default: true }),
        sortBy: stringEnum(SORT_FIELDS, { default: "relevance" }),
        sortDescending: Type.Optional(Type.Boolean()),
        fileTypes: Type.Optional(StringList("Document types or extensions, e.g. pdf,docx")),
        startDate: Type.Optional(Type.String({ description: "ISO date or relative offset such as -7d" })),
        endDate: Type.Optional(Type.String()),
      }),
      async run(params) {
        const response = await state.searcher.search(params.indexName, params.query, {
          maxResults: params.maxResults,
          includeSnippets: params.includeSnippets,
          sortBy: params.sortBy,
          sortDescending: params.sortDescending,
          fileTypes: parseStringList(params.fileTypes, "fileTypes"),
          startDate: parseOptionalDate(params.startDate, "startDate"),
          endDate: parseOptionalDate(params.endDate, "endDate"),
        });
        return { ...response };
      },
    }),

    defineTool({
      name: "doc_test_index_query",
      label: "Test Index Query",
      description: "Show how a query is split into terms and its top five matches.",
      service: SERVICE,
      parameters: Type.Object({ indexName: IndexName, query: Type.String({ minLength: 1 }) }),
      async run(params) {
        const terms = DocumentSearcher.queryTerms(params.query);
        const response = await state.searcher.search(params.indexName, params.query, {
          maxResults: TEST_QUERY_RESULTS,
          includeSnippets: false,
        });
        return {
          indexName: params.indexName,
          query: response.query,
          valid: terms.length > 0,
          terms,
          totalHits: response.totalHits,
          topResults: response.results.map((r) => ({ filePath: r.filePath, title: r.title, relevanceScore: r.relevanceScore })),
        };
      },
    }),

    defineTool({
      name: "doc_unload_index",
      label: "Unload Index",
      description: "Free an index's memory. It stays on disk and loads again on the next search.",
      service: SERVICE,
      parameters: Type.Object({ indexName: IndexName }),
      async run(params) {
        requireIndex(params.indexName);
        return { indexName: params.indexName, unloaded: state.indexes.unloadIndex(params.indexName) };
      },
    }),

    defineTool({
      name: "doc_unload_all_indexes",
      label: "Unload All Indexes",
      description: "Free the memory of every loaded index.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        return { unloaded: state.indexes.unloadAllIndexes() };
      },
    }),

    defineTool({
      name: "doc_delete_index",
      label: "Delete Index",
      description: "Remove an index from memory and delete its file.",
      service: SERVICE,
      parameters: Type.Object({ indexName: IndexName }),
      async run(params) {
        requireIndex(params.indexName);
        const deleted = await state.indexes.deleteIndex(params.indexName);
        return { indexName: params.indexName, deleted };
      },
    }),

    defineTool({
      name: "doc_get_index_memory_status",
      label: "Index Memory Status",
      description: "Whether an index (or every index) is loaded and its estimated memory use.",
      service: SERVICE,
      parameters: Type.Object({ indexName: Type.Optional(Type.String()) }),
      async run(params) {
        if (params.indexName) {
          requireIndex(params.indexName);
          return { status: await state.indexes.getMemoryStatus(params.indexName) };
        }
        const indexes = await state.indexes.getAllMemoryStatus();
        const totalMb = indexes.reduce((sum, s) => sum + s.estimatedMemoryUsageMb, 0);
        return { indexes, loaded: indexes.filter((s) => s.isLoadedInMemory).length, estimatedTotalMb: Math.round(totalMb * 100) / 100 };
      },
    }),

    defineTool({
      name: "doc_find_index_for_directory",
      label: "Find Index for Directory",
      description: "The index that covers a directory, matched by name or by its recorded root.",
      service: SERVICE,
      parameters: Type.Object({ directoryPath: FilePath("Directory") }),
      async run(params) {
        const indexName = await state.indexes.findIndexForDirectory(params.directoryPath);
        return { directoryPath: resolve(params.directoryPath), found: indexName !== undefined, indexName };
      },
    }),
  ];
}
