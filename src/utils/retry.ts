import { sleep } from './async.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry: (error: unknown, attempt: number) => boolean;
  /** Overrides the computed backoff, e.g. with a server-provided retry-after. */
  delayFor?: (error: unknown, attempt: number) => number | undefined;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  wait?: (ms: number) => Promise<void>;
}

export function backoffDelay(attempt: number, baseDelayMs = 500, maxDelayMs = 30_000): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.wait ?? ((ms: number) => sleep(ms));
  let attempt = 1;
  while (true) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || !options.shouldRetry(error, attempt)) {
        throw error;
      }
      const delayMs =
        options.delayFor?.(error, attempt) ??
        backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
      attempt++;
    }
  }
}
