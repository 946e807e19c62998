import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../../../../src/testing/tool-harness.js";
import { DocumentError } from "../errors.js";
import { DocumentExtractor, normalizeText } from "./extractor.js";
import { joinTextItems } from "./pdf.js";

const { mockGetDocument, mockExtractRawText } = vi.hoisted(() => ({
  mockGetDocument: vi.fn(),
  mockExtractRawText: vi.fn(),
}));

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({ getDocument: mockGetDocument }));
vi.mock("mammoth", () => ({ extractRawText: mockExtractRawText }));

function fakePdf(pages: unknown[][], title?: string) {
  return {
    numPages: pages.length,
    getPage: async (n: number) => ({
      getTextContent: async () => ({ items: pages[n - 1] }),
      cleanup: () => undefined,
    }),
    getMetadata: async () => ({ info: title ? { Title: title } : {} }),
    destroy: vi.fn(async () => undefined),
  };
}

function passwordException(code: number) {
  return Object.assign(new Error("password"), { name: "PasswordException", code });
}

describe("normalizeText", () => {
  it("collapses spaces and blank line runs", () => {
    expect(normalizeText("\n\n  a   b \r\n\r\n\r\n c\t\td\n\n")).toBe("a b\n\nc d");
  });
});

describe("joinTextItems", () => {
  it("breaks lines on end-of-line markers", () => {
    expect(joinTextItems([{ str: "Hello" }, { str: "world", hasEOL: true }, { str: "Next line" }, { type: "marker" }])).toBe(
      "Hello world\nNext line",
    );
  });
});

describe("DocumentExtractor", () => {
  let dir: string;
  const extractor = new DocumentExtractor({ logger: silentLogger });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "doc-extract-"));
    mockGetDocument.mockReset();
    mockExtractRawText.mockReset();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads plain text without a byte order mark", async () => {
    const file = join(dir, "notes.txt");
    await writeFile(file, "\uFEFFfirst line\nsecond line");

    const doc = await extractor.extract(file);

    expect(doc).toMatchObject({
      filePath: file,
      documentType: "text",
      text: "first line\nsecond line",
      title: "notes",
      metadata: { wordCount: 4, characterCount: 22, fileSize: 25 },
      warnings: [],
    });
  });

  it("takes a markdown title from the first heading", async () => {
    const file = join(dir, "guide.md");
    await writeFile(file, "intro\n# Setup Guide \nbody");
    expect((await extractor.extract(file)).title).toBe("Setup Guide");
  });

  it("strips markup from html", async () => {
    const file = join(dir, "report.html");
    await writeFile(
      file,
      "<html><head><title>Quarterly Report</title><style>p { color: red }</style></head>" +
        "<body><h1>Revenue</h1><p>Up   5%</p><script>track()</script></body></html>",
    );

    const doc = await extractor.extract(file);

    expect(doc.title).toBe("Quarterly Report");
    expect(doc.text).toBe("Revenue\nUp 5%");
  });

  it("rejects unsupported extensions", async () => {
    const file = join(dir, "image.bmp");
    await writeFile(file, "BM");
    await expect(extractor.extract(file)).rejects.toMatchObject({ name: "DocumentError", code: "UNSUPPORTED_TYPE" });
  });

  it("renders each worksheet as csv", async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ["name", "qty"],
        ["bolt", 4],
      ]),
      "Parts",
    );
    const file = join(dir, "parts.xlsx");
    await writeFile(file, XLSX.write(workbook, { type: "buffer", bookType: "xlsx" }));

    const doc = await extractor.extract(file);

    expect(doc.documentType).toBe("xlsx");
    expect(doc.text).toBe("## Sheet: Parts\nname,qty\nbolt,4");
    expect(doc.metadata.sheetNames).toEqual(["Parts"]);
  });

  it("normalizes Word document text", async () => {
    mockExtractRawText.mockResolvedValue({ value: "Line one\n\n\nLine two", messages: [{ type: "warning", message: "unknown style" }] });
    const file = join(dir, "memo.docx");
    await writeFile(file, "stub");

    const doc = await extractor.extract(file);

    expect(doc.text).toBe("Line one\n\nLine two");
    expect(doc.warnings).toEqual(["warning: unknown style"]);
  });

  it("joins pdf pages and flags pages without text", async () => {
    const pdf = fakePdf([[{ str: "Hello" }, { str: "world", hasEOL: true }, { str: "Next line" }], []], "Annual Summary");
    mockGetDocument.mockReturnValue({ promise: Promise.resolve(pdf) });
    const file = join(dir, "summary.pdf");
    await writeFile(file, "%PDF-1.7");

    const doc = await extractor.extract(file);

    expect(doc).toMatchObject({
      text: "Hello world\nNext line",
      title: "Annual Summary",
      metadata: { pageCount: 2 },
      warnings: ["Page 2 has no text layer"],
    });
    expect(pdf.destroy).toHaveBeenCalled();
  });

  it("reports a protected pdf without a password", async () => {
    mockGetDocument.mockImplementation(() => ({ promise: Promise.reject(passwordException(1)) }));
    const file = join(dir, "locked.pdf");
    await writeFile(file, "%PDF-1.7");

    const error = await extractor.extract(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DocumentError);
    expect(error).toMatchObject({ code: "PASSWORD_REQUIRED", filePath: file });
  });

  it("uses a registered password and reports it as incorrect when rejected", async () => {
    const withPasswords = new DocumentExtractor({
      logger: silentLogger,
      passwords: { getPassword: (path) => (path.endsWith("locked.pdf") ? "test-secret" : undefined) },
    });
    mockGetDocument.mockImplementation(() => ({ promise: Promise.reject(passwordException(1)) }));
    const file = join(dir, "locked.pdf");
    await writeFile(file, "%PDF-1.7");

    await expect(withPasswords.extract(file)).rejects.toMatchObject({ code: "INCORRECT_PASSWORD" });
    expect(mockGetDocument).toHaveBeenCalledWith(expect.objectContaining({ password: "test-secret" }));
  });
});
