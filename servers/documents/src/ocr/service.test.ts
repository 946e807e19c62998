import { beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../../../../src/testing/tool-harness.js";
import { OcrService, isMeaningfulText, parseTesseractTsv, type CommandRunner } from "./service.js";

const { mockReadPdf } = vi.hoisted(() => ({ mockReadPdf: vi.fn() }));

vi.mock("../extraction/pdf.js", () => ({ readPdf: mockReadPdf }));

const HEADER = "level\tpage_num\tblock_num\tpar_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext";
const TSV = [
  HEADER,
  "1\t1\t0\t0\t0\t0\t0\t0\t800\t600\t-1\t",
  "5\t1\t1\t1\t1\t1\t10\t10\t50\t12\t96\tHello",
  "5\t1\t1\t1\t1\t2\t70\t10\t50\t12\t87\tworld",
  "4\t1\t1\t1\t2\t0\t10\t30\t90\t12\t-1\t",
  "5\t1\t1\t1\t2\t1\t10\t30\t60\t12\t90\tSecond",
  "5\t1\t1\t1\t2\t2\t80\t30\t5\t12\t-1\t ",
  "",
].join("\n");

const TEXT_LAYER = "This page already carries a text layer long enough to be kept as is.";

function service(run: CommandRunner) {
  return new OcrService({
    tesseractPath: "tesseract",
    pdftoppmPath: "pdftoppm",
    language: "eng",
    timeoutMs: 5_000,
    logger: silentLogger,
    run,
    now: () => new Date("2024-05-01T12:00:00.000Z"),
  });
}

describe("parseTesseractTsv", () => {
  it("groups words into lines and averages confidence", () => {
    expect(parseTesseractTsv(TSV)).toEqual({ text: "Hello world\nSecond", confidence: 0.91, wordCount: 3 });
  });

  it("returns nothing for output without a header", () => {
    expect(parseTesseractTsv("")).toEqual({ text: "", confidence: 0, wordCount: 0 });
  });
});

describe("isMeaningfulText", () => {
  it("ignores whitespace when counting characters", () => {
    expect(isMeaningfulText(`${"a ".repeat(49)}`)).toBe(false);
    expect(isMeaningfulText(TEXT_LAYER)).toBe(true);
  });
});

describe("OcrService", () => {
  const run = vi.fn<CommandRunner>();

  beforeEach(() => {
    run.mockReset();
    mockReadPdf.mockReset();
    run.mockImplementation(async (command, args) => {
      if (args[0] === "--version") return { stdout: "tesseract 5.3.0\n leptonica-1.82.0\n", stderr: "" };
      if (args[0] === "-v") return { stdout: "", stderr: "pdftoppm version 22.02.0\n" };
      if (command === "pdftoppm" && args.includes("3")) throw new Error("render failed");
      if (command === "pdftoppm") return { stdout: "", stderr: "" };
      return { stdout: TSV, stderr: "" };
    });
  });

  it("reports tool versions", async () => {
    const status = await service(run).status();
    expect(status).toEqual({
      available: true,
      language: "eng",
      tesseract: { available: true, path: "tesseract", version: "tesseract 5.3.0" },
      pdftoppm: { available: true, path: "pdftoppm", version: "pdftoppm version 22.02.0" },
    });
  });

  it("recognises an image", async () => {
    const result = await service(run).extractTextFromImage("/scans/receipt.png");

    expect(result).toEqual({
      text: "Hello world\nSecond",
      confidence: 0.91,
      metadata: {
        filePath: "/scans/receipt.png",
        processedAt: "2024-05-01T12:00:00.000Z",
        language: "eng",
        wordCount: 3,
        extractedLength: 18,
      },
    });
    expect(run).toHaveBeenCalledWith("tesseract", ["/scans/receipt.png", "stdout", "-l", "eng", "tsv"], { timeoutMs: 5_000 });
  });

  it("fails when tesseract cannot run", async () => {
    run.mockRejectedValue(new Error("spawn tesseract ENOENT"));
    await expect(service(run).extractTextFromImage("/scans/receipt.png")).rejects.toMatchObject({
      code: "OCR_UNAVAILABLE",
      message: "OCR service is not available",
    });
  });

  it("keeps text layers and recognises the other pages", async () => {
    mockReadPdf.mockResolvedValue({
      pageCount: 3,
      pages: [
        { pageNumber: 1, text: TEXT_LAYER },
        { pageNumber: 2, text: "" },
        { pageNumber: 3, text: "" },
      ],
    });

    const result = await service(run).extractTextFromScannedPdf("/scans/mixed.pdf", "test-secret");

    expect(result.text).toBe(`${TEXT_LAYER}\n\nHello world\nSecond\n\n[OCR error on page 3: render failed]`);
    expect(result).toMatchObject({
      pagesProcessed: 1,
      pagesWithErrors: 1,
      warnings: ["Page 3: render failed"],
      metadata: { filePath: "/scans/mixed.pdf", totalPages: 3 },
    });
    expect(mockReadPdf).toHaveBeenCalledWith("/scans/mixed.pdf", { password: "test-secret" });
    expect(run).toHaveBeenCalledWith(
      "pdftoppm",
      [
        "-r",
        "300",
        "-f",
        "2",
        "-l",
        "2",
        "-png",
        "-singlefile",
        "-upw",
        "test-secret",
        "/scans/mixed.pdf",
        expect.stringMatching(/page-2$/),
      ],
      { timeoutMs: 5_000 },
    );
  });

  it("calls a pdf scanned when most sampled pages lack text", async () => {
    mockReadPdf.mockResolvedValue({
      pageCount: 12,
      pages: [
        { pageNumber: 1, text: TEXT_LAYER },
        { pageNumber: 2, text: "" },
        { pageNumber: 3, text: "p. 3" },
      ],
    });

    expect(await service(run).isPdfScanned("/scans/book.pdf")).toEqual({
      filePath: "/scans/book.pdf",
      scanned: true,
      totalPages: 12,
      pagesChecked: 3,
      pagesWithoutText: 2,
    });
    expect(mockReadPdf).toHaveBeenCalledWith("/scans/book.pdf", { password: undefined, maxPages: 3 });
  });
});
