/**
 * Retry policy for Azure SDK and REST calls.
 */

import { errorCode, errorMessage, isRecord, parseRetryAfter, retryAsync, type RetryInfo } from "../../../src/index.js";
import type { AzureRetryOptions } from "./types.js";

export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "ServiceTimeout",
  "RetryableError",
  "RequestRateTooLarge",
]);

const RETRYABLE_MESSAGE =
  /throttl|too many requests|rate limit|server busy|temporarily unavailable|service unavailable|socket hang up|fetch failed/i;

/** Shape of `RestError` from @azure/core-rest-pipeline, read without importing it. */
export type AzureRestErrorShape = {
  name: string;
  message: string;
  code?: string;
  statusCode?: number;
  response?: { headers?: { get(name: string): string | undefined } };
};

export function isAzureRestError(error: unknown): error is Error & AzureRestErrorShape {
  return error instanceof Error && (error.name === "RestError" || "statusCode" in error);
}

export function getAzureStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const status = error.statusCode ?? error.status;
  return typeof status === "number" ? status : undefined;
}

export function isAzureNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return getAzureStatusCode(error) === 404 || code === "ResourceNotFound" || code === "ResourceGroupNotFound";
}

export function getAzureRetryAfterMs(error: unknown): number | undefined {
  if (!isAzureRestError(error)) return undefined;
  return parseRetryAfter(error.response?.headers?.get("retry-after"));
}

export function shouldRetryAzureError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  const status = getAzureStatusCode(error);
  if (status === 429) return true;
  if (status !== undefined && status >= 500 && status < 600) return true;
  if (status !== undefined) return false;

  return RETRYABLE_MESSAGE.test(errorMessage(error));
}

export function withAzureRetry<T>(
  fn: () => Promise<T>,
  retry?: AzureRetryOptions,
  onRetry?: (info: RetryInfo) => void,
): Promise<T> {
  return retryAsync(fn, {
    ...retry,
    shouldRetry: shouldRetryAzureError,
    retryAfterMs: getAzureRetryAfterMs,
    onRetry,
  });
}

/**
 * Run a lookup and map a 404 to `null`.
 */
export async function getOrNull<T>(fn: () => Promise<T>, retry?: AzureRetryOptions): Promise<T | null> {
  try {
    return await withAzureRetry(fn, retry);
  } catch (error) {
    if (isAzureNotFound(error)) return null;
    throw error;
  }
}
