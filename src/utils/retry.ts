/**
 * Bounded retry loop
 *
 * Wraps a single async call with a fixed attempt budget, a bounded
 * exponential backoff and an explicit retry predicate. The last error is
 * rethrown unchanged once the budget is spent or the predicate declines.
 */

export interface RetryOptions {
  maxAttempts: number;
  /** Delay in ms before attempt `attempt + 1` (attempt is 1-based) */
  backoff: (attempt: number) => number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * min(maxMs, baseMs * 2^(attempt-1))
 */
export function exponentialBackoff(baseMs = 2000, maxMs = 30000): (attempt: number) => number {
  return (attempt) => Math.min(maxMs, baseMs * 2 ** (attempt - 1));
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = options.backoff(attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
