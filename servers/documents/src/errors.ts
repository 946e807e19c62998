/**
 * Document error classification and remediation catalog.
 */

import {
  ErrorReporter,
  errorCode,
  errorMessage,
  parseRemediationCatalog,
  type ClassifiedError,
  type ErrorClassifier,
} from "../../../src/index.js";
import remediation from "./remediation.json" with { type: "json" };

export type DocumentErrorCode =
  | "PASSWORD_REQUIRED"
  | "INCORRECT_PASSWORD"
  | "UNSUPPORTED_TYPE"
  | "EXTRACTION_FAILED"
  | "OCR_UNAVAILABLE"
  | "OCR_FAILED"
  | "INDEX_CORRUPT";

/**
 * A file could be read but not turned into text.
 */
export class DocumentError extends Error {
  readonly code: DocumentErrorCode;
  readonly filePath?: string;

  constructor(code: DocumentErrorCode, message: string, filePath?: string) {
    super(message);
    this.name = "DocumentError";
    this.code = code;
    this.filePath = filePath;
  }
}

const FILE_ERRORS: Record<string, string> = {
  ENOENT: "File or directory not found",
  EACCES: "Permission denied",
  EPERM: "Operation not permitted",
  EISDIR: "Expected a file but found a directory",
  ENOTDIR: "Expected a directory but found a file",
};

export const classifyDocumentError: ErrorClassifier = (error): ClassifiedError | undefined => {
  if (error instanceof DocumentError) {
    return { errorType: "DocumentProcessing", message: error.message, code: error.code, details: error.filePath };
  }

  const code = errorCode(error);
  if (code && code in FILE_ERRORS) {
    return {
      errorType: code === "ENOENT" ? "NotFound" : "DocumentProcessing",
      message: FILE_ERRORS[code],
      details: errorMessage(error),
      code,
    };
  }
  return undefined;
};

export const documentRemediation = parseRemediationCatalog(remediation, "documents/remediation.json");

export function createDocumentErrorReporter(): ErrorReporter {
  return new ErrorReporter({ catalog: documentRemediation, classifiers: [classifyDocumentError] });
}
