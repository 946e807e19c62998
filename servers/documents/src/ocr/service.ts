/**
 * OCR through the tesseract CLI, with pdftoppm rasterising PDF pages.
 */

import { execFile } from "node:child_process";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { promisify } from "node:util";
import { errorMessage, type Logger } from "../../../../src/index.js";
import { DocumentError } from "../errors.js";
import { readPdf } from "../extraction/pdf.js";
import type { ImageOcrResult, OcrStatus, PdfOcrResult, ScanCheckResult, ToolProbe } from "./types.js";

const execFileAsync = promisify(execFile);

/** A page with at least this many non-whitespace characters keeps its text layer. */
export const MEANINGFUL_TEXT_CHARS = 50;
const SCAN_SAMPLE_PAGES = 3;
const RASTER_DPI = 300;
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export type CommandResult = { stdout: string; stderr: string };

export type CommandRunner = (command: string, args: string[], options: { timeoutMs: number }) => Promise<CommandResult>;

export const execCommand: CommandRunner = async (command, args, options) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    timeout: options.timeoutMs,
    maxBuffer: MAX_OUTPUT_BYTES,
    encoding: "utf8",
  });
  return { stdout, stderr };
};

export type OcrServiceOptions = {
  tesseractPath: string;
  pdftoppmPath: string;
  language: string;
  timeoutMs: number;
  logger: Logger;
  run?: CommandRunner;
  now?: () => Date;
};

export function isMeaningfulText(text: string): boolean {
  return text.replace(/\s+/g, "").length >= MEANINGFUL_TEXT_CHARS;
}

/**
 * Rebuild text and mean confidence from `tesseract ... tsv` output.
 */
export function parseTesseractTsv(tsv: string): { text: string; confidence: number; wordCount: number } {
  const rows = tsv.split(/\r?\n/).filter((row) => row.length > 0);
  const header = rows.shift()?.split("\t") ?? [];
  const col = (name: string) => header.indexOf(name);
  const [levelCol, pageCol, blockCol, parCol, lineCol, confCol, textCol] = [
    col("level"),
    col("page_num"),
    col("block_num"),
    col("par_num"),
    col("line_num"),
    col("conf"),
    col("text"),
  ];
  if (textCol < 0 || confCol < 0) return { text: "", confidence: 0, wordCount: 0 };

  const lines = new Map<string, string[]>();
  let confidenceSum = 0;
  let wordCount = 0;
  for (const row of rows) {
    const cells = row.split("\t");
    if (cells[levelCol] !== "5") continue;
    const word = (cells[textCol] ?? "").trim();
    const confidence = Number(cells[confCol]);
    if (!word || !(confidence >= 0)) continue;

    const key = [cells[pageCol], cells[blockCol], cells[parCol], cells[lineCol]].join(":");
    const line = lines.get(key) ?? [];
    line.push(word);
    lines.set(key, line);
    confidenceSum += confidence;
    wordCount++;
  }

  return {
    text: [...lines.values()].map((words) => words.join(" ")).join("\n"),
    confidence: wordCount === 0 ? 0 : Math.round((confidenceSum / wordCount) * 100) / 10_000,
    wordCount,
  };
}

export class OcrService {
  private readonly options: OcrServiceOptions;
  private readonly run: CommandRunner;
  private readonly now: () => Date;
  private probe?: Promise<OcrStatus>;

  constructor(options: OcrServiceOptions) {
    this.options = options;
    this.run = options.run ?? execCommand;
    this.now = options.now ?? (() => new Date());
  }

  /** Probes both tools once; `refresh` probes again. */
  async status(refresh = false): Promise<OcrStatus> {
    if (!this.probe || refresh) this.probe = this.probeTools();
    return this.probe;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.status()).tesseract.available;
  }

  async extractTextFromImage(imagePath: string): Promise<ImageOcrResult> {
    const filePath = resolve(imagePath);
    await this.requireTesseract();
    const started = Date.now();
    const { text, confidence, wordCount } = await this.recognize(filePath);
    this.options.logger.info(`OCR of ${filePath} finished`, { confidence, durationMs: Date.now() - started });
    return {
      text,
      confidence,
      metadata: {
        filePath,
        processedAt: this.now().toISOString(),
        language: this.options.language,
        wordCount,
        extractedLength: text.length,
      },
    };
  }

  /**
   * Pages with a usable text layer keep it; the rest are rasterised and
   * recognised. A failing page is reported and skipped.
   */
  async extractTextFromScannedPdf(pdfPath: string, password?: string): Promise<PdfOcrResult> {
    const filePath = resolve(pdfPath);
    await this.requireTesseract();
    const status = await this.status();
    const pdf = await readPdf(filePath, { password });

    const parts: string[] = [];
    const warnings: string[] = [];
    let pagesProcessed = 0;
    let pagesWithErrors = 0;
    const workDir = await mkdtemp(join(tmpdir(), "cloud-mcp-ocr-"));
    try {
      for (const page of pdf.pages) {
        if (isMeaningfulText(page.text)) {
          parts.push(page.text);
          continue;
        }
        try {
          if (!status.pdftoppm.available) {
            throw new DocumentError("OCR_UNAVAILABLE", `pdftoppm is not available: ${status.pdftoppm.error ?? "not found"}`);
          }
          const image = await this.rasterizePage(filePath, page.pageNumber, workDir, password);
          parts.push((await this.recognize(image)).text);
          pagesProcessed++;
        } catch (error) {
          this.options.logger.warn(`OCR failed on page ${page.pageNumber} of ${filePath}: ${errorMessage(error)}`);
          parts.push(`[OCR error on page ${page.pageNumber}: ${errorMessage(error)}]`);
          warnings.push(`Page ${page.pageNumber}: ${errorMessage(error)}`);
          pagesWithErrors++;
        }
      }
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }

    const text = parts.join("\n\n");
    this.options.logger.info(`OCR of ${filePath} finished`, { pagesProcessed, pagesWithErrors });
    return {
      text,
      pagesProcessed,
      pagesWithErrors,
      warnings,
      metadata: {
        filePath,
        processedAt: this.now().toISOString(),
        totalPages: pdf.pageCount,
        extractedLength: text.length,
      },
    };
  }

  /** Scanned when more than half of the first pages lack a text layer. */
  async isPdfScanned(pdfPath: string, password?: string): Promise<ScanCheckResult> {
    const filePath = resolve(pdfPath);
    const pdf = await readPdf(filePath, { password, maxPages: SCAN_SAMPLE_PAGES });
    const pagesWithoutText = pdf.pages.filter((page) => !isMeaningfulText(page.text)).length;
    return {
      filePath,
      scanned: pdf.pages.length > 0 && pagesWithoutText > Math.floor(pdf.pages.length / 2),
      totalPages: pdf.pageCount,
      pagesChecked: pdf.pages.length,
      pagesWithoutText,
    };
  }

  private async requireTesseract(): Promise<void> {
    const status = await this.status();
    if (!status.tesseract.available) {
      throw new DocumentError("OCR_UNAVAILABLE", "OCR service is not available");
    }
  }

  private async recognize(imagePath: string): Promise<{ text: string; confidence: number; wordCount: number }> {
    const { stdout } = await this.run(
      this.options.tesseractPath,
      [imagePath, "stdout", "-l", this.options.language, "tsv"],
      { timeoutMs: this.options.timeoutMs },
    );
    return parseTesseractTsv(stdout);
  }

  private async rasterizePage(pdfPath: string, pageNumber: number, workDir: string, password?: string): Promise<string> {
    const prefix = join(workDir, `page-${pageNumber}`);
    const args = ["-r", String(RASTER_DPI), "-f", String(pageNumber), "-l", String(pageNumber), "-png", "-singlefile"];
    if (password) args.push("-upw", password);
    args.push(pdfPath, prefix);
    await this.run(this.options.pdftoppmPath, args, { timeoutMs: this.options.timeoutMs });
    return `${prefix}.png`;
  }

  private async probeTools(): Promise<OcrStatus> {
    const [tesseract, pdftoppm] = await Promise.all([
      this.probeTool(this.options.tesseractPath, ["--version"]),
      this.probeTool(this.options.pdftoppmPath, ["-v"]),
    ]);
    if (!tesseract.available) this.options.logger.warn(`tesseract not available: ${tesseract.error ?? "unknown error"}`);
    return { available: tesseract.available && pdftoppm.available, language: this.options.language, tesseract, pdftoppm };
  }

  private async probeTool(path: string, args: string[]): Promise<ToolProbe> {
    try {
      const { stdout, stderr } = await this.run(path, args, { timeoutMs: 10_000 });
      // both tools print their version banner on stderr in some builds
      const version = `${stdout}\n${stderr}`.split("\n").map((line) => line.trim()).find((line) => line.length > 0);
      return { available: true, path, version };
    } catch (error) {
      return { available: false, path, error: errorMessage(error) };
    }
  }
}
