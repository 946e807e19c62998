/**
 * Azure error classification and remediation catalog.
 */

import {
  ErrorReporter,
  errorCode,
  errorMessage,
  errorName,
  parseRemediationCatalog,
  type ClassifiedError,
  type ErrorClassifier,
} from "../../../src/index.js";
import remediation from "./remediation.json" with { type: "json" };
import { getAzureStatusCode, isAzureRestError } from "./retry.js";

const AUTH_ERROR_NAMES = new Set([
  "AuthenticationError",
  "AggregateAuthenticationError",
  "CredentialUnavailableError",
  "AuthenticationRequiredError",
]);

const SQL_ERROR_NAMES = new Set(["ConnectionError", "RequestError", "TransactionError"]);

export const classifyAzureError: ErrorClassifier = (error): ClassifiedError | undefined => {
  const name = errorName(error);

  if (AUTH_ERROR_NAMES.has(name)) {
    return {
      errorType: "Authentication",
      message: "Azure credentials could not be used",
      details: errorMessage(error),
      code: name,
    };
  }

  if (isAzureRestError(error)) {
    const code = errorCode(error) ?? (error.statusCode === undefined ? error.name : `HTTP${error.statusCode}`);
    return {
      errorType: "AzureService",
      message: `Azure service error: ${code}`,
      details: error.message,
      code,
      statusCode: getAzureStatusCode(error),
      requestId: error.response?.headers?.get("x-ms-request-id"),
    };
  }

  if (SQL_ERROR_NAMES.has(name)) {
    return {
      errorType: "AzureService",
      message: `SQL error: ${errorMessage(error)}`,
      code: errorCode(error) ?? name,
    };
  }

  return undefined;
};

export const azureRemediation = parseRemediationCatalog(remediation, "azure/remediation.json");

export function createAzureErrorReporter(): ErrorReporter {
  return new ErrorReporter({ catalog: azureRemediation, classifiers: [classifyAzureError] });
}
