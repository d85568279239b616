// pattern: Imperative Shell

/**
 * Retry loop for upstream requests.
 * The caller decides which errors are transient; everything else is rethrown at once.
 */

import { UpstreamTransportError } from "../errors.ts";

export type RetryPolicy = {
  readonly maxRetries: number;
  readonly initialBackoffMs: number;
};

export type RetryHooks = {
  /** Called before each backoff, with the failed attempt (0-based) and the wait ahead. */
  readonly onRetry?: (error: unknown, attempt: number, backoffMs: number) => void;
  /** Aborting cancels a pending backoff. */
  readonly signal?: AbortSignal;
};

function backoff(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new UpstreamTransportError("request aborted"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new UpstreamTransportError("request aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function callWithRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  isRetryableError: (error: unknown) => boolean,
  hooks: RetryHooks = {},
): Promise<T> {
  const attempts = policy.maxRetries + 1;
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt < attempts - 1) {
        const backoffMs = policy.initialBackoffMs * Math.pow(2, attempt);
        hooks.onRetry?.(error, attempt, backoffMs);
        await backoff(backoffMs, hooks.signal);
      }
    }
  }

  throw lastError;
}
