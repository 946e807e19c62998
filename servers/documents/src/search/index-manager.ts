/**
 * Index files on disk and the ones loaded into memory.
 *
 * An index stays discoverable after it is unloaded; only deleteIndex
 * forgets it.
 */

import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { Value } from "@sinclair/typebox/value";
import MiniSearch from "minisearch";
import { NotFoundError, errorCode, errorMessage, type Logger } from "../../../../src/index.js";
import { DocumentError } from "../errors.js";
import { IndexFileSchema, type IndexFile, type IndexMemoryStatus, type IndexedDocument } from "./types.js";

const INDEX_EXTENSION = ".json";
const DEFAULT_MEMORY_ESTIMATE_MB = 50;

export function createSearchEngine(documents: IndexedDocument[] = []): MiniSearch<IndexedDocument> {
  const engine = new MiniSearch<IndexedDocument>({
    fields: ["title", "fileName", "content"],
    searchOptions: {
      boost: { title: 3, fileName: 2 },
      fuzzy: 0.2,
      prefix: true,
    },
  });
  engine.addAll(documents);
  return engine;
}

export class LoadedIndex {
  readonly file: IndexFile;
  readonly engine: MiniSearch<IndexedDocument>;
  private readonly byId: Map<string, IndexedDocument>;

  constructor(file: IndexFile) {
    this.file = file;
    this.engine = createSearchEngine(file.documents);
    this.byId = new Map(file.documents.map((doc) => [doc.id, doc]));
  }

  get name(): string {
    return this.file.name;
  }

  document(id: string): IndexedDocument | undefined {
    return this.byId.get(id);
  }
}

export class IndexManager {
  readonly basePath: string;
  private readonly discovered = new Set<string>();
  private readonly loaded = new Map<string, LoadedIndex>();
  private readonly logger: Logger;

  constructor(options: { dataDirectory: string; logger: Logger }) {
    this.basePath = join(resolve(options.dataDirectory), "indexes");
    this.logger = options.logger;
  }

  /** Create the index directory and pick up index files already in it. */
  async initialize(): Promise<string[]> {
    await mkdir(this.basePath, { recursive: true });
    const entries = await readdir(this.basePath, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isFile() && entry.name.endsWith(INDEX_EXTENSION)) {
        this.discovered.add(basename(entry.name, INDEX_EXTENSION));
      }
    }
    const names = this.getIndexNames();
    if (names.length > 0) this.logger.info(`Discovered ${names.length} indexes: ${names.join(", ")}`);
    return names;
  }

  indexPath(name: string): string {
    return join(this.basePath, `${name}${INDEX_EXTENSION}`);
  }

  indexExists(name: string): boolean {
    return this.discovered.has(name);
  }

  getIndexNames(): string[] {
    return [...this.discovered].sort();
  }

  isLoaded(name: string): boolean {
    return this.loaded.has(name);
  }

  async getIndex(name: string): Promise<LoadedIndex> {
    if (!this.discovered.has(name)) throw new NotFoundError("Index", name, `Index '${name}' not found`);
    const cached = this.loaded.get(name);
    if (cached) return cached;

    this.logger.info(`Loading index into memory: ${name}`);
    const index = new LoadedIndex(await this.readIndexFile(name));
    this.loaded.set(name, index);
    return index;
  }

  /** Write the index file and keep the new contents loaded. */
  async saveIndex(file: IndexFile): Promise<LoadedIndex> {
    await mkdir(this.basePath, { recursive: true });
    const target = this.indexPath(file.name);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, JSON.stringify(file), "utf8");
    await rename(temp, target);

    this.discovered.add(file.name);
    const index = new LoadedIndex(file);
    this.loaded.set(file.name, index);
    this.logger.debug(`Saved index ${file.name}`, { documents: file.documents.length });
    return index;
  }

  /** Returns whether the index was loaded. */
  unloadIndex(name: string): boolean {
    const unloaded = this.loaded.delete(name);
    if (unloaded) this.logger.info(`Unloaded index from memory: ${name}`);
    return unloaded;
  }

  unloadAllIndexes(): number {
    const count = this.loaded.size;
    this.loaded.clear();
    if (count > 0) this.logger.info(`Unloaded ${count} indexes from memory`);
    return count;
  }

  async getMemoryStatus(name: string): Promise<IndexMemoryStatus> {
    const isLoadedInMemory = this.loaded.has(name);
    return {
      indexName: name,
      isDiscovered: this.discovered.has(name),
      isLoadedInMemory,
      estimatedMemoryUsageMb: isLoadedInMemory ? await this.estimateMemoryMb(name) : 0,
    };
  }

  async getAllMemoryStatus(): Promise<IndexMemoryStatus[]> {
    return Promise.all(this.getIndexNames().map((name) => this.getMemoryStatus(name)));
  }

  /** Returns whether a file was removed from disk. */
  async deleteIndex(name: string): Promise<boolean> {
    this.unloadIndex(name);
    this.discovered.delete(name);
    try {
      await rm(this.indexPath(name));
    } catch (error) {
      if (errorCode(error) === "ENOENT") return false;
      throw error;
    }
    this.logger.info(`Deleted index ${name}`);
    return true;
  }

  /**
   * First index whose name contains the directory's base name, else one
   * built over exactly that directory.
   */
  async findIndexForDirectory(directory: string): Promise<string | undefined> {
    const absolute = resolve(directory);
    const dirName = basename(absolute).toLowerCase();
    const names = this.getIndexNames();
    const byName = dirName ? names.find((name) => name.toLowerCase().includes(dirName)) : undefined;
    if (byName) return byName;

    for (const name of names) {
      const rootPath = this.loaded.get(name)?.file.rootPath ?? (await this.readRootPath(name));
      if (rootPath !== undefined && resolve(rootPath) === absolute) return name;
    }
    return undefined;
  }

  private async readRootPath(name: string): Promise<string | undefined> {
    try {
      return (await this.readIndexFile(name)).rootPath;
    } catch (error) {
      this.logger.warn(`Cannot read index ${name}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async readIndexFile(name: string): Promise<IndexFile> {
    const path = this.indexPath(name);
    let data: unknown;
    try {
      data = JSON.parse(await readFile(path, "utf8"));
    } catch (error) {
      if (errorCode(error) === "ENOENT") throw new NotFoundError("Index", name, `Index '${name}' not found`);
      throw new DocumentError("INDEX_CORRUPT", `Index ${name} cannot be read: ${errorMessage(error)}`, path);
    }
    if (!Value.Check(IndexFileSchema, data)) {
      const first = Value.Errors(IndexFileSchema, data).First();
      throw new DocumentError("INDEX_CORRUPT", `Index ${name} is not a valid index file: ${first?.path} ${first?.message}`, path);
    }
    return data;
  }

  private async estimateMemoryMb(name: string): Promise<number> {
    try {
      const info = await stat(this.indexPath(name));
      return Math.round((info.size / (1024 * 1024)) * 100) / 100;
    } catch (error) {
      this.logger.debug(`Cannot size index ${name}: ${errorMessage(error)}`);
      return DEFAULT_MEMORY_ESTIMATE_MB;
    }
  }
}
