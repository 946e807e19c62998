/**
 * Retry policy for AWS SDK v3 calls: throttling and transient faults only.
 */

import { errorCode, errorMessage } from "../../../src/errors/index.js";
import { parseRetryAfter, retryAsync, type RetryInfo, type RetryPolicy } from "../../../src/retry.js";

const AWS_RETRY_PATTERN =
  /throttl|rate exceeded|503|504|timed? ?out|ECONNRESET|ETIMEDOUT|TooManyRequestsException|ServiceUnavailable|RequestLimitExceeded|SlowDown/i;

const AWS_RETRYABLE_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ProvisionedThroughputExceededException",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalFailure",
  "InternalServiceError",
  "InternalServerError",
  "ServerException",
  "SlowDown",
  "RequestThrottled",
  "RequestTimeout",
  "PriorRequestNotComplete",
  "LimitExceededException",
  "ECONNRESET",
  "ETIMEDOUT",
]);

type AwsErrorShape = {
  name: string;
  $metadata?: { httpStatusCode?: number; requestId?: string };
  $response?: { headers?: Record<string, string | undefined> };
  $retryable?: { throttling?: boolean };
};

export function isAwsServiceError(error: unknown): error is Error & AwsErrorShape {
  return error instanceof Error && "$metadata" in error && typeof error.$metadata === "object";
}

export function getAwsStatusCode(error: unknown): number | undefined {
  return isAwsServiceError(error) ? error.$metadata?.httpStatusCode : undefined;
}

export function getAwsRetryAfterMs(error: unknown): number | undefined {
  if (!isAwsServiceError(error)) return undefined;
  const status = error.$metadata?.httpStatusCode;
  if (status !== 429 && status !== 503) return undefined;
  return parseRetryAfter(error.$response?.headers?.["retry-after"]);
}

export function shouldRetryAwsError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && AWS_RETRYABLE_CODES.has(code)) return true;

  if (isAwsServiceError(error)) {
    if (AWS_RETRYABLE_CODES.has(error.name)) return true;
    if (error.$retryable) return true;
    const status = error.$metadata?.httpStatusCode;
    if (status === 429 || status === 500 || status === 502 || status === 503 || status === 504) return true;
    return false;
  }

  return AWS_RETRY_PATTERN.test(errorMessage(error));
}

export type AwsRetryOptions = {
  label?: string;
  retry?: Partial<RetryPolicy>;
  onRetry?: (info: RetryInfo) => void;
};

export function withAwsRetry<T>(fn: () => Promise<T>, options: AwsRetryOptions = {}): Promise<T> {
  return retryAsync(fn, {
    ...options.retry,
    label: options.label,
    shouldRetry: shouldRetryAwsError,
    retryAfterMs: getAwsRetryAfterMs,
    onRetry: options.onRetry,
  });
}
