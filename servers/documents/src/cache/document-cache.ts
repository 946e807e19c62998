/**
 * Loaded documents, least recently used first out.
 *
 * Bounded by entry count and by estimated memory (two bytes per character).
 */

import { resolve } from "node:path";
import type { Logger } from "../../../../src/index.js";
import type { DocumentSummary, DocumentType, ExtractedDocument } from "../types.js";

const BYTES_PER_MB = 1024 * 1024;

type CacheEntry = {
  document: ExtractedDocument;
  estimatedBytes: number;
  loadedAt: Date;
  lastAccessedAt: Date;
  accessCount: number;
};

export type DocumentCacheOptions = {
  maxDocuments: number;
  maxMemoryMb: number;
  logger: Logger;
  now?: () => Date;
};

export type CacheStatistics = {
  documentCount: number;
  maxDocuments: number;
  memoryUsageBytes: number;
  maxMemoryBytes: number;
  memoryUsageMb: number;
  memoryUsagePercent: number;
  documentTypes: Partial<Record<DocumentType, number>>;
};

export function estimateBytes(document: ExtractedDocument): number {
  return document.text.length * 2;
}

export class DocumentCache {
  // Map iteration order doubles as recency order: oldest first.
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxDocuments: number;
  private readonly maxBytes: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: DocumentCacheOptions) {
    this.maxDocuments = options.maxDocuments;
    this.maxBytes = options.maxMemoryMb * BYTES_PER_MB;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  static key(filePath: string): string {
    return resolve(filePath);
  }

  /**
   * Store a document, evicting older entries until it fits. Returns the
   * evicted paths. A document larger than the whole budget is still kept
   * once everything else is gone.
   */
  add(document: ExtractedDocument): string[] {
    const key = DocumentCache.key(document.filePath);
    this.entries.delete(key);

    const estimatedBytes = estimateBytes(document);
    const evicted: string[] = [];
    while (
      this.entries.size > 0 &&
      (this.entries.size >= this.maxDocuments || this.memoryUsage() + estimatedBytes > this.maxBytes)
    ) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      evicted.push(oldest.value);
    }
    if (evicted.length > 0) this.logger.info(`Evicted ${evicted.length} documents from cache`, { evicted });

    const at = this.now();
    this.entries.set(key, { document, estimatedBytes, loadedAt: at, lastAccessedAt: at, accessCount: 0 });
    return evicted;
  }

  get(filePath: string): ExtractedDocument | undefined {
    const key = DocumentCache.key(filePath);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    entry.lastAccessedAt = this.now();
    entry.accessCount++;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.document;
  }

  has(filePath: string): boolean {
    return this.entries.has(DocumentCache.key(filePath));
  }

  remove(filePath: string): boolean {
    return this.entries.delete(DocumentCache.key(filePath));
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  get size(): number {
    return this.entries.size;
  }

  memoryUsage(): number {
    let total = 0;
    for (const entry of this.entries.values()) total += entry.estimatedBytes;
    return total;
  }

  /** Most recently used first. */
  list(): DocumentSummary[] {
    return [...this.entries.values()].reverse().map((entry) => ({
      filePath: entry.document.filePath,
      documentType: entry.document.documentType,
      title: entry.document.title,
      characterCount: entry.document.metadata.characterCount,
      pageCount: entry.document.metadata.pageCount,
      estimatedBytes: entry.estimatedBytes,
      loadedAt: entry.loadedAt.toISOString(),
      lastAccessedAt: entry.lastAccessedAt.toISOString(),
      accessCount: entry.accessCount,
    }));
  }

  statistics(): CacheStatistics {
    const used = this.memoryUsage();
    const documentTypes: CacheStatistics["documentTypes"] = {};
    for (const { document } of this.entries.values()) {
      documentTypes[document.documentType] = (documentTypes[document.documentType] ?? 0) + 1;
    }
    return {
      documentCount: this.entries.size,
      maxDocuments: this.maxDocuments,
      memoryUsageBytes: used,
      maxMemoryBytes: this.maxBytes,
      memoryUsageMb: Math.round((used / BYTES_PER_MB) * 100) / 100,
      memoryUsagePercent: Math.round((used / this.maxBytes) * 10_000) / 100,
      documentTypes,
    };
  }
}
