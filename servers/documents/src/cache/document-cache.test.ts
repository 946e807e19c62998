import { resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { silentLogger } from "../../../../src/testing/tool-harness.js";
import type { ExtractedDocument } from "../types.js";
import { DocumentCache } from "./document-cache.js";

function doc(filePath: string, text = "abc"): ExtractedDocument {
  return {
    filePath: resolve(filePath),
    documentType: "text",
    text,
    title: filePath,
    metadata: { fileSize: text.length, modified: "2024-05-01T00:00:00.000Z", wordCount: 1, characterCount: text.length },
    warnings: [],
  };
}

function cache(maxDocuments: number, maxMemoryMb = 1) {
  let tick = 0;
  return new DocumentCache({
    maxDocuments,
    maxMemoryMb,
    logger: silentLogger,
    now: () => new Date(Date.UTC(2024, 4, 1, 0, 0, tick++)),
  });
}

describe("DocumentCache", () => {
  it("evicts the least recently used document when full", () => {
    const c = cache(2);
    c.add(doc("/docs/a.txt"));
    c.add(doc("/docs/b.txt"));
    expect(c.get("/docs/a.txt")?.filePath).toBe(resolve("/docs/a.txt"));

    const evicted = c.add(doc("/docs/c.txt"));

    expect(evicted).toEqual([resolve("/docs/b.txt")]);
    expect(c.has("/docs/a.txt")).toBe(true);
    expect(c.has("/docs/b.txt")).toBe(false);
    expect(c.size).toBe(2);
  });

  it("evicts until the memory estimate fits", () => {
    const c = cache(10, 1);
    const halfMb = "x".repeat(262_144);
    c.add(doc("/docs/a.txt", halfMb));
    c.add(doc("/docs/b.txt", halfMb));
    expect(c.memoryUsage()).toBe(1_048_576);

    const evicted = c.add(doc("/docs/c.txt", halfMb));

    expect(evicted).toEqual([resolve("/docs/a.txt")]);
    expect(c.memoryUsage()).toBe(1_048_576);
  });

  it("keeps a document larger than the budget once the cache is empty", () => {
    const c = cache(10, 1);
    c.add(doc("/docs/a.txt"));
    const evicted = c.add(doc("/docs/big.txt", "x".repeat(600_000)));
    expect(evicted).toEqual([resolve("/docs/a.txt")]);
    expect(c.has("/docs/big.txt")).toBe(true);
  });

  it("replaces a reloaded document without evicting others", () => {
    const c = cache(2);
    c.add(doc("/docs/a.txt"));
    c.add(doc("/docs/b.txt"));
    expect(c.add(doc("/docs/a.txt", "new text"))).toEqual([]);
    expect(c.get("/docs/a.txt")?.text).toBe("new text");
  });

  it("lists most recently used first with access counts", () => {
    const c = cache(5);
    c.add(doc("/docs/a.txt"));
    c.add(doc("/docs/b.txt"));
    c.get("/docs/a.txt");

    const listed = c.list();

    expect(listed.map((d) => d.filePath)).toEqual([resolve("/docs/a.txt"), resolve("/docs/b.txt")]);
    expect(listed[0]).toMatchObject({
      accessCount: 1,
      estimatedBytes: 6,
      loadedAt: "2024-05-01T00:00:00.000Z",
      lastAccessedAt: "2024-05-01T00:00:02.000Z",
    });
  });

  it("reports statistics by document type", () => {
    const c = cache(4, 1);
    c.add(doc("/docs/a.txt"));
    c.add(doc("/docs/b.txt"));
    expect(c.statistics()).toEqual({
      documentCount: 2,
      maxDocuments: 4,
      memoryUsageBytes: 12,
      maxMemoryBytes: 1_048_576,
      memoryUsageMb: 0,
      memoryUsagePercent: 0,
      documentTypes: { text: 2 },
    });
    expect(c.clear()).toBe(2);
    expect(c.size).toBe(0);
  });
});
