import { describe, expect, it, vi } from "vitest";
import { applyJitter, computeDelay, parseRetryAfter, resolveRetryPolicy, retryAsync } from "./retry.js";

const noSleep = async () => {};

describe("resolveRetryPolicy", () => {
  it("clamps invalid values", () => {
    expect(resolveRetryPolicy({ maxAttempts: 0, minDelayMs: 500, maxDelayMs: 10, jitterFactor: 3 })).toEqual({
      maxAttempts: 1,
      minDelayMs: 500,
      maxDelayMs: 500,
      jitterFactor: 1,
    });
  });
});

describe("computeDelay", () => {
  const policy = { maxAttempts: 5, minDelayMs: 100, maxDelayMs: 1_000, jitterFactor: 0 };

  it("doubles per attempt up to the maximum", () => {
    expect([1, 2, 3, 4, 5].map((a) => computeDelay(policy, a, undefined))).toEqual([100, 200, 400, 800, 1000]);
  });

  it("honours Retry-After", () => {
    expect(computeDelay(policy, 1, 700)).toBe(700);
    expect(computeDelay(policy, 1, 10)).toBe(100);
  });

  it("applies jitter symmetrically", () => {
    expect(applyJitter(1000, 0.2, () => 1)).toBe(1200);
    expect(applyJitter(1000, 0.2, () => 0)).toBe(800);
    expect(applyJitter(1000, 0, () => 0)).toBe(1000);
  });
});

describe("retryAsync", () => {
  it("retries until success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("busy")).mockResolvedValueOnce("ok");
    const onRetry = vi.fn();
    await expect(retryAsync(fn, { sleep: noSleep, onRetry, label: "op", jitterFactor: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, delayMs: 100, label: "op" }));
  });

  it("stops when the predicate refuses", async () => {
    const error = new Error("fatal");
    const fn = vi.fn().mockRejectedValue(error);
    await expect(retryAsync(fn, { sleep: noSleep, shouldRetry: () => false })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("still busy"));
    await expect(retryAsync(fn, { sleep: noSleep, maxAttempts: 3 })).rejects.toThrow("still busy");
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe("parseRetryAfter", () => {
  it("reads seconds and HTTP dates", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter("Wed, 01 May 2024 12:00:10 GMT", Date.parse("2024-05-01T12:00:00Z"))).toBe(10_000);
    expect(parseRetryAfter("soon")).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
  });
});
