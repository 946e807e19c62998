/**
 * AWS error classification and remediation catalog.
 */

import {
  ErrorReporter,
  errorName,
  parseRemediationCatalog,
  type ClassifiedError,
  type ErrorClassifier,
} from "../../../src/errors/index.js";
import remediation from "./remediation.json" with { type: "json" };
import { isAwsServiceError } from "./retry.js";

const AUTH_ERROR_NAMES = new Set(["CredentialsProviderError", "TokenProviderError"]);

export const classifyAwsError: ErrorClassifier = (error): ClassifiedError | undefined => {
  if (AUTH_ERROR_NAMES.has(errorName(error))) {
    return {
      errorType: "Authentication",
      message: "AWS credentials could not be loaded",
      details: error instanceof Error ? error.message : String(error),
    };
  }

  if (isAwsServiceError(error)) {
    return {
      errorType: "AWSService",
      message: `AWS service error: ${error.name}`,
      details: error.message,
      code: error.name,
      statusCode: error.$metadata?.httpStatusCode,
      requestId: error.$metadata?.requestId,
    };
  }

  return undefined;
};

export const awsRemediation = parseRemediationCatalog(remediation, "aws/remediation.json");

export function createAwsErrorReporter(): ErrorReporter {
  return new ErrorReporter({
    catalog: awsRemediation,
    classifiers: [classifyAwsError],
    codeField: "awsErrorCode",
  });
}
