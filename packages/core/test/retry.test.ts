/**
 * Unit tests for the retry executor
 */

import { describe, it, expect, vi } from "vitest";
import { GistStorageError } from "../src/errors.js";
import {
  calculateBackoffDelay,
  DEFAULT_RETRY_CONFIG,
  gistRetryPolicy,
  withRetry,
  type RetryAttempt,
} from "../src/retry.js";

const noJitter = () => 0;

/** Operation failing with the given errors, then resolving "ok" */
const failingThen = (...errors: Error[]) => {
  const queue = [...errors];
  return vi.fn(async () => {
    const next = queue.shift();
    if (next) throw next;
    return "ok";
  });
};

describe("calculateBackoffDelay", () => {
  it("grows exponentially from the base delay", () => {
    expect(calculateBackoffDelay(0, DEFAULT_RETRY_CONFIG, null, noJitter)).toBe(1000);
    expect(calculateBackoffDelay(1, DEFAULT_RETRY_CONFIG, null, noJitter)).toBe(2000);
    expect(calculateBackoffDelay(2, DEFAULT_RETRY_CONFIG, null, noJitter)).toBe(4000);
  });

  it("caps at the maximum delay", () => {
    expect(calculateBackoffDelay(5, DEFAULT_RETRY_CONFIG, null, noJitter)).toBe(10000);
  });

  it("adds at most jitterFactor of the delay", () => {
    expect(calculateBackoffDelay(0, DEFAULT_RETRY_CONFIG, null, () => 0.999)).toBe(1100);
    expect(calculateBackoffDelay(5, DEFAULT_RETRY_CONFIG, null, () => 0.999)).toBe(10999);
  });

  it("prefers an advertised delay, still capped", () => {
    expect(calculateBackoffDelay(0, DEFAULT_RETRY_CONFIG, 3000, noJitter)).toBe(3000);
    expect(calculateBackoffDelay(0, DEFAULT_RETRY_CONFIG, 60000, noJitter)).toBe(10000);
  });
});

describe("withRetry", () => {
  it("returns the first success after transient failures", async () => {
    const operation = failingThen(
      GistStorageError.networkTimeout(30000, "get_gist"),
      GistStorageError.apiRequestFailed("get_gist", 503)
    );
    const sleep = vi.fn(async (_ms: number) => undefined);

    await expect(
      withRetry(operation, { operationName: "get_gist", sleep, random: noJitter })
    ).resolves.toBe("ok");

    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("does not retry non-retryable errors", async () => {
    const failure = GistStorageError.encryptionFailed("Decryption failed or data tampered");
    const operation = failingThen(failure);
    const sleep = vi.fn(async (_ms: number) => undefined);

    await expect(withRetry(operation, { operationName: "get_gist", sleep })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up after maxRetries and rethrows the last error", async () => {
    const errors = [1, 2, 3, 4].map((n) => GistStorageError.apiRequestFailed(`attempt_${n}`, 500));
    const operation = failingThen(...errors);

    await expect(
      withRetry(operation, {
        operationName: "update_gist",
        sleep: async () => undefined,
        random: noJitter,
      })
    ).rejects.toBe(errors[3]);
    expect(operation).toHaveBeenCalledTimes(4);
  });

  it("waits the advertised time on rate limits", async () => {
    const operation = failingThen(GistStorageError.rateLimitExceeded(2));
    const sleep = vi.fn(async (_ms: number) => undefined);

    await withRetry(operation, { operationName: "create_gist", sleep, random: noJitter });

    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("reports each retry", async () => {
    const failure = GistStorageError.networkTimeout(100, "get_user");
    const attempts: RetryAttempt[] = [];

    await withRetry(failingThen(failure), {
      operationName: "get_user",
      sleep: async () => undefined,
      random: noJitter,
      onRetry: (attempt) => attempts.push(attempt),
    });

    expect(attempts).toEqual([
      { operationName: "get_user", attempt: 1, maxRetries: 3, delayMs: 1000, error: failure },
    ]);
  });

  it("accepts a custom policy", async () => {
    const operation = failingThen(new Error("flaky"), new Error("flaky"));

    await expect(
      withRetry(operation, {
        operationName: "custom",
        config: { ...DEFAULT_RETRY_CONFIG, maxRetries: 1 },
        policy: { isRetryable: (error) => error instanceof Error && error.message === "flaky" },
        sleep: async () => undefined,
      })
    ).rejects.toThrow("flaky");
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe("gistRetryPolicy", () => {
  it("only advertises a wait for rate limits", () => {
    expect(gistRetryPolicy.retryAfterMs?.(GistStorageError.rateLimitExceeded(5))).toBe(5000);
    expect(gistRetryPolicy.retryAfterMs?.(GistStorageError.apiRequestFailed("x", 500))).toBeNull();
  });

  it("ignores errors outside the taxonomy", () => {
    expect(gistRetryPolicy.isRetryable(new Error("boom"))).toBe(false);
  });
});
