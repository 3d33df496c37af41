/**
 * Retry with exponential backoff and jitter
 */

import { GistStorageError } from "./errors.js";

export type RetryConfig = {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Upper bound of the random extra delay, as a fraction of the delay */
  jitterFactor: number;
};

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
});

/** Decides which failures are worth another attempt */
export type RetryPolicy = {
  isRetryable: (error: unknown) => boolean;
  /** Server-advertised wait in milliseconds, if the error carries one */
  retryAfterMs?: (error: unknown) => number | null;
};

export type RetryAttempt = {
  operationName: string;
  /** 1-based number of the retry about to run */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = {
  operationName: string;
  config?: RetryConfig;
  policy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  /** Returns a number in [0, 1) */
  random?: () => number;
  onRetry?: (attempt: RetryAttempt) => void;
};

/** Retries transient GistStorageErrors, honouring Retry-After on rate limits */
export const gistRetryPolicy: RetryPolicy = {
  isRetryable: (error) =>
    error instanceof GistStorageError && error.isRetryable(),
  retryAfterMs: (error) =>
    error instanceof GistStorageError && error.kind === "RateLimitExceeded"
      ? error.retryDelay()
      : null,
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt + 1`:
 * min(maxDelay, advertised ?? base × multiplier^attempt) plus jitter
 */
export const calculateBackoffDelay = (
  attempt: number,
  config: RetryConfig,
  advertisedMs: number | null = null,
  random: () => number = Math.random
): number => {
  const exponential =
    config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const capped = Math.min(config.maxDelayMs, advertisedMs ?? exponential);
  const jitterRange = Math.floor(capped * config.jitterFactor);
  const jitter = jitterRange > 0 ? Math.floor(random() * (jitterRange + 1)) : 0;
  return Math.floor(capped) + jitter;
};

/**
 * Run `operation`, retrying while the policy allows and the budget lasts.
 * Resolves with the first success or rejects with the last error.
 */
export const withRetry = async <T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> => {
  const config = options.config ?? DEFAULT_RETRY_CONFIG;
  const policy = options.policy ?? gistRetryPolicy;
  const sleep = options.sleep ?? defaultSleep;

  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= config.maxRetries || !policy.isRetryable(error)) {
        throw error;
      }

      const delayMs = calculateBackoffDelay(
        attempt,
        config,
        policy.retryAfterMs?.(error) ?? null,
        options.random
      );
      attempt += 1;

      options.onRetry?.({
        operationName: options.operationName,
        attempt,
        maxRetries: config.maxRetries,
        delayMs,
        error,
      });

      await sleep(delayMs);
    }
  }
};
