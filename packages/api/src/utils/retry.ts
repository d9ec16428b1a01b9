import { setTimeout as sleep } from 'timers/promises';
import { GenerationError } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryEvent {
  attempt: number; // the attempt that failed, 1-based
  delayMs: number;
  error: GenerationError;
}

/**
 * Exponential backoff: base · 2^(attempt-1), stretched to the backend's
 * retry-after hint when that is longer. Never exceeds maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const wanted = retryAfterMs !== undefined ? Math.max(exponential, retryAfterMs) : exponential;
  return Math.min(policy.maxDelayMs, wanted);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error,
 * or exhausts `maxAttempts`. Only GenerationErrors are retried; anything
 * else (including an abort) is rethrown at once.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: { signal?: AbortSignal; onRetry?: (event: RetryEvent) => void } = {}
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof GenerationError) || !error.retryable) {
        throw error;
      }
      if (attempt >= policy.maxAttempts || options.signal?.aborted) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt, error.retryAfterMs);
      options.onRetry?.({ attempt, delayMs, error });
      if (delayMs > 0) {
        await sleep(delayMs, undefined, { signal: options.signal });
      }
    }
  }
}
