export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  backoff: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Error raised by withRetry once the last attempt failed, carrying the attempt count
 */
export class RetryExhaustedError extends Error {
  constructor(public readonly lastError: unknown, public readonly attempts: number) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'RetryExhaustedError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * Delay before attempt n+1 is baseDelayMs * backoff^(n-1).
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  let attempt = 0;

  while (true) {
    attempt++;
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      const canRetry = attempt < options.maxAttempts
        && !options.signal?.aborted
        && options.shouldRetry(error);
      if (!canRetry) {
        throw new RetryExhaustedError(error, attempt);
      }

      const delayMs = options.baseDelayMs * Math.pow(options.backoff, attempt - 1);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
      if (options.signal?.aborted) {
        throw new RetryExhaustedError(error, attempt);
      }
    }
  }
}
