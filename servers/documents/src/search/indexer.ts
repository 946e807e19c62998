/**
 * Builds or extends an index from the files under a directory.
 */

import { stat } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { glob } from "glob";
import { ToolInputError, errorCode, errorMessage, type Logger } from "../../../../src/index.js";
import type { DocumentExtractor } from "../extraction/extractor.js";
import { isSupportedFile } from "../extraction/extractor.js";
import { SUPPORTED_EXTENSIONS } from "../types.js";
import type { IndexManager } from "./index-manager.js";
import { INDEX_FORMAT_VERSION, type IndexBuildResult, type IndexFailure, type IndexFile, type IndexedDocument } from "./types.js";

export const INDEX_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export type BuildIndexRequest = {
  indexName: string;
  rootPath: string;
  /** Glob patterns; every supported extension when empty. */
  includePatterns?: string[];
  recursive?: boolean;
};

export function validateIndexName(name: string): string {
  const trimmed = name.trim();
  if (!INDEX_NAME_PATTERN.test(trimmed)) {
    throw new ToolInputError("indexName may only contain letters, digits, '-' and '_'", { field: "indexName" });
  }
  return trimmed;
}

/**
 * Patterns relative to the root. Bare patterns such as `*.pdf` reach into
 * subdirectories when recursive.
 */
export function resolvePatterns(patterns: string[] | undefined, recursive: boolean): string[] {
  const base = patterns && patterns.length > 0 ? patterns : SUPPORTED_EXTENSIONS.map((ext) => `*${ext}`);
  return base.map((pattern) => {
    const normalized = pattern.replace(/\\/g, "/");
    if (!recursive) return normalized.replace(/^\*\*\//, "");
    return normalized.includes("/") ? normalized : `**/${normalized}`;
  });
}

export class DocumentIndexer {
  private readonly indexes: IndexManager;
  private readonly extractor: DocumentExtractor;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: { indexes: IndexManager; extractor: DocumentExtractor; logger: Logger; now?: () => Date }) {
    this.indexes = options.indexes;
    this.extractor = options.extractor;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async discoverFiles(rootPath: string, patterns: string[] | undefined, recursive: boolean): Promise<string[]> {
    const files = await glob(resolvePatterns(patterns, recursive), {
      cwd: rootPath,
      absolute: true,
      nodir: true,
      nocase: true,
    });
    return [...new Set(files.map((file) => resolve(file)))].filter(isSupportedFile).sort();
  }

  async buildIndex(request: BuildIndexRequest): Promise<IndexBuildResult> {
    const indexName = validateIndexName(request.indexName);
    const rootPath = resolve(request.rootPath);
    await assertDirectory(rootPath);

    const started = this.now();
    const files = await this.discoverFiles(rootPath, request.includePatterns, request.recursive ?? true);
    this.logger.info(`Indexing ${files.length} files from ${rootPath} into ${indexName}`);

    const existing = this.indexes.indexExists(indexName) ? (await this.indexes.getIndex(indexName)).file : undefined;
    const documents = new Map<string, IndexedDocument>((existing?.documents ?? []).map((doc) => [doc.id, doc]));

    const failures: IndexFailure[] = [];
    let indexed = 0;
    for (const filePath of files) {
      try {
        const extracted = await this.extractor.extract(filePath);
        documents.set(filePath, {
          id: filePath,
          content: extracted.text,
          filePath,
          fileName: basename(filePath),
          title: extracted.title,
          documentType: extracted.documentType,
          modified: extracted.metadata.modified,
          fileSize: extracted.metadata.fileSize,
        });
        indexed++;
      } catch (error) {
        this.logger.warn(`Failed to index ${filePath}: ${errorMessage(error)}`);
        failures.push({ filePath, error: errorMessage(error) });
      }
    }

    const finished = this.now();
    const file: IndexFile = {
      version: INDEX_FORMAT_VERSION,
      name: indexName,
      rootPath: existing?.rootPath ?? rootPath,
      createdAt: existing?.createdAt ?? started.toISOString(),
      updatedAt: finished.toISOString(),
      documents: [...documents.values()],
    };
    await this.indexes.saveIndex(file);

    const result: IndexBuildResult = {
      indexName,
      rootPath,
      startTime: started.toISOString(),
      endTime: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
      totalDocuments: files.length,
      indexedDocuments: indexed,
      failedDocuments: failures.length,
      failures,
    };
    this.logger.info(`Index ${indexName} built`, { indexed, failed: failures.length, durationMs: result.durationMs });
    return result;
  }
}

export async function assertDirectory(path: string, field = "rootPath"): Promise<void> {
  try {
    const info = await stat(path);
    if (info.isDirectory()) return;
  } catch (error) {
    if (errorCode(error) !== "ENOENT" && errorCode(error) !== "ENOTDIR") throw error;
  }
  throw new ToolInputError(`${path} is not a directory`, { field });
}
