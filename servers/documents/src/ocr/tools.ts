/**
 * OCR tools for scanned PDFs and images.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, type ToolDefinition } from "../../../../src/index.js";
import { FilePath, Password } from "../params.js";
import type { DocumentServerState } from "../state.js";

const SERVICE = "ocr";

export function createOcrTools(state: DocumentServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "doc_get_ocr_status",
      label: "OCR Status",
      description: "Whether tesseract and pdftoppm are installed, with their versions.",
      service: SERVICE,
      parameters: Type.Object({ refresh: Type.Boolean({ default: false }) }),
      async run(params) {
        return { ...(await state.ocr.status(params.refresh)) };
      },
    }),

    defineTool({
      name: "doc_check_scanned_pdf",
      label: "Check Scanned PDF",
      description: "Whether a PDF is mostly scanned images, judged from its first pages.",
      service: SERVICE,
      parameters: Type.Object({ filePath: FilePath("PDF file"), password: Password }),
      async run(params) {
        const password = state.extractor.resolvePassword(params.filePath, params.password);
        const result = await state.ocr.isPdfScanned(params.filePath, password);
        return { ...result, recommendation: result.scanned ? "Use doc_ocr_pdf to read this file" : "Use doc_extract_content" };
      },
    }),

    defineTool({
      name: "doc_ocr_pdf",
      label: "OCR PDF",
      description: "Text of a scanned PDF. Pages with a text layer keep it; the others are recognised with tesseract.",
      service: SERVICE,
      parameters: Type.Object({
        filePath: FilePath("PDF file"),
        password: Password,
        maxLength: Type.Integer({ minimum: 1, default: 100_000 }),
      }),
      async run(params) {
        const password = state.extractor.resolvePassword(params.filePath, params.password);
        const result = await state.ocr.extractTextFromScannedPdf(params.filePath, password);
        const truncated = result.text.length > params.maxLength;
        return { ...result, text: truncated ? result.text.slice(0, params.maxLength) : result.text, truncated };
      },
    }),

    defineTool({
      name: "doc_ocr_image",
      label: "OCR Image",
      description: "Text and mean confidence recognised in an image (png, jpg, tiff, bmp).",
      service: SERVICE,
      parameters: Type.Object({ filePath: FilePath("Image file") }),
      async run(params) {
        return { ...(await state.ocr.extractTextFromImage(params.filePath)) };
      },
    }),
  ];
}
