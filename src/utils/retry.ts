/**
 * Bounded retry with exponential backoff and jitter.
 *
 * Used for storage calls (TransientStorageError) and remote calls
 * (TransientRemoteError). Errors the caller does not classify as retryable
 * propagate on the first throw.
 */

export interface RetryOptions {
  /** Total attempts including the first call */
  attempts: number;
  /** Delay before the second attempt; doubles on each further attempt */
  baseDelayMs: number;
  /** Upper bound for a single delay */
  maxDelayMs?: number;
  /** Return true to retry the thrown error */
  shouldRetry: (err: unknown) => boolean;
  /** Called before each wait, for logging */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  // Uniform in [ceiling / 2, ceiling]
  return Math.round(ceiling / 2 + Math.random() * (ceiling / 2));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxDelayMs = options.maxDelayMs ?? 30_000;
  let attempt = 1;

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= options.attempts || !options.shouldRetry(err)) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, options.baseDelayMs, maxDelayMs);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
