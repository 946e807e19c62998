import { describe, expect, it, vi } from "vitest";
import { getAwsRetryAfterMs, getAwsStatusCode, shouldRetryAwsError, withAwsRetry } from "./retry.js";
import { awsError } from "./testing.js";

function withHeaders(error: Error, headers: Record<string, string>): Error {
  return Object.assign(error, { $response: { headers } });
}

describe("shouldRetryAwsError", () => {
  it("retries throttling exceptions whatever the status", () => {
    expect(shouldRetryAwsError(awsError("ThrottlingException", 400, "Rate exceeded"))).toBe(true);
    expect(shouldRetryAwsError(awsError("SlowDown", 503))).toBe(true);
  });

  it("retries transient HTTP statuses", () => {
    expect(shouldRetryAwsError(awsError("UnknownError", 502))).toBe(true);
    expect(shouldRetryAwsError(awsError("UnknownError", 429))).toBe(true);
  });

  it("honours the SDK's retryable flag", () => {
    const error = Object.assign(awsError("RequestInterrupted", 400), { $retryable: { throttling: false } });
    expect(shouldRetryAwsError(error)).toBe(true);
  });

  it("does not retry other service errors, even with a throttling message", () => {
    expect(shouldRetryAwsError(awsError("AccessDeniedException", 403))).toBe(false);
    expect(shouldRetryAwsError(awsError("ValidationException", 400, "rate exceeded for field"))).toBe(false);
    expect(shouldRetryAwsError(awsError("ResourceNotFoundException", 404))).toBe(false);
  });

  it("falls back to codes and messages for network errors", () => {
    expect(shouldRetryAwsError(Object.assign(new Error("read failed"), { code: "ETIMEDOUT" }))).toBe(true);
    expect(shouldRetryAwsError(new Error("Connection timed out"))).toBe(true);
    expect(shouldRetryAwsError(new Error("Unexpected token in JSON"))).toBe(false);
  });
});

describe("getAwsRetryAfterMs", () => {
  it("reads Retry-After on 429 and 503 responses only", () => {
    expect(getAwsRetryAfterMs(withHeaders(awsError("TooManyRequestsException", 429), { "retry-after": "3" }))).toBe(3000);
    expect(getAwsRetryAfterMs(withHeaders(awsError("ServiceUnavailable", 503), { "retry-after": "1" }))).toBe(1000);
    expect(getAwsRetryAfterMs(withHeaders(awsError("ValidationException", 400), { "retry-after": "3" }))).toBeUndefined();
    expect(getAwsRetryAfterMs(new Error("busy"))).toBeUndefined();
  });
});

describe("getAwsStatusCode", () => {
  it("reads the status from service errors only", () => {
    expect(getAwsStatusCode(awsError("NoSuchBucket", 404))).toBe(404);
    expect(getAwsStatusCode(new Error("plain"))).toBeUndefined();
  });
});

describe("withAwsRetry", () => {
  it("retries a throttled call and reports the label", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(awsError("ThrottlingException", 400)).mockResolvedValueOnce("ok");
    await expect(
      withAwsRetry(fn, { label: "DescribeLogGroups", retry: { maxAttempts: 2, minDelayMs: 0, jitterFactor: 0 }, onRetry }),
    ).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, label: "DescribeLogGroups" }));
  });

  it("gives up at once on a non-retryable error", async () => {
    const denied = awsError("AccessDeniedException", 403);
    const fn = vi.fn().mockRejectedValue(denied);
    await expect(withAwsRetry(fn, { retry: { maxAttempts: 3 } })).rejects.toBe(denied);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
