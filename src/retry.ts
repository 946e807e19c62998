/**
 * Retry with exponential backoff and jitter, shared by the AWS and Azure
 * managers. Providers supply their own retry predicate and Retry-After reader.
 */

export type RetryPolicy = {
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
};

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
  label?: string;
};

export type RetryOptions = Partial<RetryPolicy> & {
  label?: string;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  retryAfterMs?: (error: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export const RETRY_DEFAULTS: RetryPolicy = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function resolveRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  const maxAttempts = Math.max(1, Math.round(overrides?.maxAttempts ?? RETRY_DEFAULTS.maxAttempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? RETRY_DEFAULTS.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs));
  const jitterFactor = Math.min(1, Math.max(0, overrides?.jitterFactor ?? RETRY_DEFAULTS.jitterFactor));
  return { maxAttempts, minDelayMs, maxDelayMs, jitterFactor };
}

export function applyJitter(delayMs: number, jitterFactor: number, random: () => number = Math.random): number {
  if (jitterFactor <= 0) return delayMs;
  const offset = (random() * 2 - 1) * jitterFactor;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Delay before the next attempt: Retry-After when given, else
 * `minDelayMs * 2^(attempt-1)`, jittered and clamped to the policy bounds.
 */
export function computeDelay(
  policy: RetryPolicy,
  attempt: number,
  retryAfterMs: number | undefined,
  random: () => number = Math.random,
): number {
  const base =
    retryAfterMs !== undefined && Number.isFinite(retryAfterMs)
      ? Math.max(retryAfterMs, policy.minDelayMs)
      : policy.minDelayMs * 2 ** (attempt - 1);
  const jittered = applyJitter(Math.min(base, policy.maxDelayMs), policy.jitterFactor, random);
  return Math.min(Math.max(jittered, policy.minDelayMs), policy.maxDelayMs);
}

export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = resolveRetryPolicy(options);
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= policy.maxAttempts || !shouldRetry(error, attempt)) throw error;

      const delayMs = computeDelay(policy, attempt, options.retryAfterMs?.(error), options.random);
      options.onRetry?.({ attempt, maxAttempts: policy.maxAttempts, delayMs, error, label: options.label });
      await sleep(delayMs);
    }
  }
}

/**
 * Parse a Retry-After header value: delta seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
