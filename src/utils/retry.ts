/**
 * Backoff retry for calls into model runtimes.
 *
 * The wait between attempts is cut short when the caller's signal aborts;
 * the last error is re-thrown either way.
 */

export interface RetryOptions {
  /** Total attempts including the first (default 3) */
  maxAttempts?: number;
  /** Wait before the second attempt (default 500) */
  initialDelayMs?: number;
  backoffFactor?: number;
  /** Upper bound on a single wait (default 30_000) */
  maxDelayMs?: number;
  /** Only errors this accepts are retried */
  retryIf?: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, nextAttempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const factor = options.backoffFactor ?? 2;
  const cap = options.maxDelayMs ?? 30_000;
  const { retryIf, onRetry, signal } = options;

  let delayMs = options.initialDelayMs ?? 500;
  let attempt = 1;

  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      const exhausted = attempt >= maxAttempts;
      if (exhausted || signal?.aborted || (retryIf !== undefined && !retryIf(error))) {
        throw error;
      }

      const pause = Math.min(delayMs, cap);
      onRetry?.(error, attempt + 1, pause);
      await wait(pause, signal);
      if (signal?.aborted) throw error;

      delayMs = pause * factor;
      attempt++;
    }
  }
}
