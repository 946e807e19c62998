export type ToolProbe = {
  available: boolean;
  path: string;
  version?: string;
  error?: string;
};

export type OcrStatus = {
  available: boolean;
  language: string;
  tesseract: ToolProbe;
  pdftoppm: ToolProbe;
};

export type ImageOcrResult = {
  text: string;
  /** Mean word confidence, 0 to 1. */
  confidence: number;
  metadata: {
    filePath: string;
    processedAt: string;
    language: string;
    wordCount: number;
    extractedLength: number;
  };
};

export type PdfOcrResult = {
  text: string;
  pagesProcessed: number;
  pagesWithErrors: number;
  warnings: string[];
  metadata: {
    filePath: string;
    processedAt: string;
    totalPages: number;
    extractedLength: number;
  };
};

export type ScanCheckResult = {
  filePath: string;
  scanned: boolean;
  totalPages: number;
  pagesChecked: number;
  pagesWithoutText: number;
};
