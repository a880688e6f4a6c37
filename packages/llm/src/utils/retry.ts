import { AbortError, ProviderError } from '../types/error.js';
import type { RetryPolicy } from '../types/config.js';

/**
 * Default retry policy for model calls.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly signal?: AbortSignal;
  readonly onRetry?: (error: ProviderError, attempt: number, delayMs: number) => void;
};

export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Retries a single operation with exponential backoff.
 *
 * Only retryable ProviderErrors are retried; everything else propagates on
 * the first failure. Wrap one request per call, never a multi-step sequence.
 * Aborting `signal` during a backoff wait rejects with AbortError.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, signal, onRetry } = options;
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = policy;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof ProviderError) || !error.retryable || attempt >= maxRetries) {
        throw error;
      }

      let delayMs = calculateBackoff(attempt, initialDelayMs, maxDelayMs, backoffMultiplier);

      if (error.retryAfter !== null) {
        // A server asking for longer than we are willing to wait is final.
        if (error.retryAfter > maxDelayMs) {
          throw error;
        }
        delayMs = error.retryAfter;
      }

      // Jitter: 0-25% of delay
      const finalDelayMs = delayMs + Math.random() * 0.25 * delayMs;

      onRetry?.(error, attempt + 1, finalDelayMs);

      await sleep(finalDelayMs, signal);
    }
  }
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortError('Retry aborted'));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Retry aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
