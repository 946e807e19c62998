import { describe, expect, it, vi } from "vitest";
import {
  getAzureRetryAfterMs,
  getOrNull,
  isAzureNotFound,
  shouldRetryAzureError,
  withAzureRetry,
} from "./retry.js";
import { NO_RETRY, restError } from "./testing.js";

function withRetryAfter(error: Error, value: string): Error {
  return Object.assign(error, {
    response: { headers: { get: (name: string) => (name === "retry-after" ? value : undefined) } },
  });
}

describe("shouldRetryAzureError", () => {
  it("retries throttling and server errors", () => {
    expect(shouldRetryAzureError(restError(429, "TooManyRequests"))).toBe(true);
    expect(shouldRetryAzureError(restError(503, "Unavailable"))).toBe(true);
    expect(shouldRetryAzureError(restError(500, "Unknown"))).toBe(true);
  });

  it("does not retry client errors", () => {
    expect(shouldRetryAzureError(restError(404, "ResourceNotFound"))).toBe(false);
    expect(shouldRetryAzureError(restError(403, "AuthorizationFailed"))).toBe(false);
  });

  it("trusts a retryable code over the status", () => {
    expect(shouldRetryAzureError(restError(400, "ServerBusy"))).toBe(true);
    expect(shouldRetryAzureError(Object.assign(new Error("read failed"), { code: "ECONNRESET" }))).toBe(true);
  });

  it("reads the message only when there is no status", () => {
    expect(shouldRetryAzureError(new Error("socket hang up"))).toBe(true);
    expect(shouldRetryAzureError(new Error("template is invalid"))).toBe(false);
    expect(shouldRetryAzureError(restError(409, "Conflict", "rate limit exceeded"))).toBe(false);
  });
});

describe("getAzureRetryAfterMs", () => {
  it("reads Retry-After seconds from a RestError response", () => {
    expect(getAzureRetryAfterMs(withRetryAfter(restError(429, "TooManyRequests"), "7"))).toBe(7000);
  });

  it("is undefined without a header or for other errors", () => {
    expect(getAzureRetryAfterMs(restError(429, "TooManyRequests"))).toBeUndefined();
    expect(getAzureRetryAfterMs(withRetryAfter(new Error("plain"), "7"))).toBeUndefined();
    expect(getAzureRetryAfterMs("busy")).toBeUndefined();
  });
});

describe("isAzureNotFound", () => {
  it("matches 404s and not-found codes", () => {
    expect(isAzureNotFound(restError(404, "NotFound"))).toBe(true);
    expect(isAzureNotFound({ status: 404 })).toBe(true);
    expect(isAzureNotFound(Object.assign(new Error("gone"), { code: "ResourceGroupNotFound" }))).toBe(true);
    expect(isAzureNotFound(restError(410, "Gone"))).toBe(false);
  });
});

describe("getOrNull", () => {
  it("returns the value of a successful lookup", async () => {
    expect(await getOrNull(async () => ({ name: "rg-1" }), NO_RETRY)).toEqual({ name: "rg-1" });
  });

  it("maps not found to null", async () => {
    expect(await getOrNull(() => Promise.reject(restError(404, "ResourceNotFound")), NO_RETRY)).toBeNull();
  });

  it("rethrows every other error", async () => {
    const denied = restError(403, "AuthorizationFailed");
    await expect(getOrNull(() => Promise.reject(denied), NO_RETRY)).rejects.toBe(denied);
  });

  it("retries a transient failure before giving an answer", async () => {
    const fn = vi.fn().mockRejectedValueOnce(restError(503, "Unavailable")).mockResolvedValueOnce("ok");
    expect(await getOrNull(fn, { maxAttempts: 2, minDelayMs: 0, jitterFactor: 0 })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe("withAzureRetry", () => {
  it("reports each retry with the Retry-After delay", async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(withRetryAfter(restError(429, "TooManyRequests"), "0"))
      .mockResolvedValueOnce("done");
    await expect(withAzureRetry(fn, { maxAttempts: 2, minDelayMs: 0, jitterFactor: 0 }, onRetry)).resolves.toBe("done");
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, maxAttempts: 2, delayMs: 0 }));
  });
});
