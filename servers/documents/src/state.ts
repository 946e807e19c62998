/**
 * Services shared by the document tools.
 */

import type { AppConfig, Logger } from "../../../src/index.js";
import { DocumentCache } from "./cache/document-cache.js";
import { DocumentExtractor } from "./extraction/extractor.js";
import { OcrService, type CommandRunner } from "./ocr/service.js";
import { PasswordManager } from "./passwords/manager.js";
import { IndexManager } from "./search/index-manager.js";
import { DocumentIndexer } from "./search/indexer.js";
import { DocumentSearcher } from "./search/searcher.js";
import type { ExtractedDocument } from "./types.js";

export type DocumentServerStateOptions = {
  config: AppConfig["documents"];
  logger: Logger;
  /** Replaces process execution for tesseract and pdftoppm. */
  runCommand?: CommandRunner;
};

export type LoadResult = {
  document: ExtractedDocument;
  fromCache: boolean;
  evicted: string[];
};

export class DocumentServerState {
  readonly config: AppConfig["documents"];
  readonly passwords: PasswordManager;
  readonly extractor: DocumentExtractor;
  readonly cache: DocumentCache;
  readonly indexes: IndexManager;
  readonly indexer: DocumentIndexer;
  readonly searcher: DocumentSearcher;
  readonly ocr: OcrService;

  constructor(options: DocumentServerStateOptions) {
    const { config, logger } = options;
    this.config = config;
    this.passwords = new PasswordManager(logger.child("passwords"));
    this.extractor = new DocumentExtractor({ logger: logger.child("extract"), passwords: this.passwords });
    this.cache = new DocumentCache({
      maxDocuments: config.maxCachedDocuments,
      maxMemoryMb: config.maxCacheMemoryMb,
      logger: logger.child("cache"),
    });
    this.indexes = new IndexManager({ dataDirectory: config.dataDirectory, logger: logger.child("index") });
    this.indexer = new DocumentIndexer({ indexes: this.indexes, extractor: this.extractor, logger: logger.child("index") });
    this.searcher = new DocumentSearcher({ indexes: this.indexes, logger: logger.child("search") });
    this.ocr = new OcrService({
      tesseractPath: config.tesseractPath,
      pdftoppmPath: config.pdftoppmPath,
      language: config.ocrLanguage,
      timeoutMs: config.ocrTimeoutMs,
      logger: logger.child("ocr"),
      run: options.runCommand,
    });
  }

  async initialize(): Promise<void> {
    await this.indexes.initialize();
  }

  /** Cached document, else extract and cache it. */
  async loadDocument(filePath: string, options: { password?: string; reload?: boolean } = {}): Promise<LoadResult> {
    if (!options.reload) {
      const cached = this.cache.get(filePath);
      if (cached) return { document: cached, fromCache: true, evicted: [] };
    }
    const document = await this.extractor.extract(filePath, { password: options.password });
    const evicted = this.cache.add(document);
    return { document, fromCache: false, evicted };
  }

  dispose(): void {
    this.cache.clear();
    this.indexes.unloadAllIndexes();
  }
}
