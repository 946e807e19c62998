/**
 * Turns any thrown value into the failure envelope returned by tools.
 */

import {
  errorMessage,
  errorName,
  isNetworkError,
  NotFoundError,
  ServiceNotInitializedError,
  ToolInputError,
  type ErrorType,
} from "./errors.js";
import { suggestActions, type RemediationCatalog } from "./remediation.js";

export type ClassifiedError = {
  errorType: ErrorType;
  message: string;
  code?: string;
  statusCode?: number;
  requestId?: string;
  details?: string;
};

/**
 * Provider-specific recognisers return undefined for errors they do not own.
 */
export type ErrorClassifier = (error: unknown) => ClassifiedError | undefined;

export type FailureEnvelope = {
  success: false;
  error: string;
  errorType: ErrorType;
  details?: string;
  suggestedActions: string[];
  errorCode?: string;
  awsErrorCode?: string;
  statusCode?: number;
  requestId?: string;
  exceptionType?: string;
  field?: string;
  found?: false;
};

export type ErrorReporterOptions = {
  catalog: RemediationCatalog;
  classifiers?: ErrorClassifier[];
  /** Envelope field carrying the vendor error code. */
  codeField?: "errorCode" | "awsErrorCode";
};

function classifyCommon(error: unknown): ClassifiedError | undefined {
  if (error instanceof ServiceNotInitializedError) {
    return { errorType: "ServiceNotInitialized", message: error.message, details: error.service };
  }
  if (error instanceof ToolInputError) {
    return { errorType: "InvalidParameter", message: error.message, code: error.code };
  }
  if (error instanceof NotFoundError) {
    return { errorType: "NotFound", message: error.message, code: "NotFound" };
  }
  return undefined;
}

export class ErrorReporter {
  private readonly catalog: RemediationCatalog;
  private readonly classifiers: ErrorClassifier[];
  private readonly codeField: "errorCode" | "awsErrorCode";

  constructor(options: ErrorReporterOptions) {
    this.catalog = options.catalog;
    this.classifiers = options.classifiers ?? [];
    this.codeField = options.codeField ?? "errorCode";
  }

  classify(error: unknown): ClassifiedError {
    const common = classifyCommon(error);
    if (common) return common;

    for (const classifier of this.classifiers) {
      const result = classifier(error);
      if (result) return result;
    }

    if (isNetworkError(error)) {
      return {
        errorType: "NetworkOrConfiguration",
        message: errorMessage(error),
        details: "The service endpoint could not be reached",
      };
    }

    return { errorType: "Unexpected", message: errorMessage(error) };
  }

  toEnvelope(error: unknown, service?: string): FailureEnvelope {
    const classified = this.classify(error);
    const envelope: FailureEnvelope = {
      success: false,
      error: classified.message,
      errorType: classified.errorType,
      suggestedActions: suggestActions(this.catalog, classified.errorType, classified.code, service),
    };
    if (classified.details) envelope.details = classified.details;
    if (classified.statusCode !== undefined) envelope.statusCode = classified.statusCode;
    if (classified.requestId) envelope.requestId = classified.requestId;
    if (classified.code) envelope[this.codeField] = classified.code;
    if (classified.errorType === "Unexpected") envelope.exceptionType = errorName(error);
    if (error instanceof ToolInputError && error.field) envelope.field = error.field;
    if (classified.errorType === "NotFound") envelope.found = false;
    return envelope;
  }
}
