/**
 * Retry logic for generative-model calls.
 * Rate limits and server errors are retried; other HTTP errors fail fast.
 */

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Extra random delay as a fraction of the computed delay (0 disables jitter) */
  jitterRatio?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxRetries: 1,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterRatio: 0,
  shouldRetry: isRetryableError,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Errors carrying an HTTP status are retried only for 429 and 5xx.
 * Anything else (network failures, unparseable model output) is retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (error === null || error === undefined) {
    return false;
  }

  if (typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status === 429 || (error.status >= 500 && error.status < 600);
  }

  return true;
}

export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitterRatio = 0
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const jitter = Math.random() * jitterRatio * exponentialDelay;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

/**
 * Execute a function with retry logic and exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt > opts.maxRetries || !opts.shouldRetry(error)) {
        throw lastError;
      }

      const delayMs = calculateDelay(
        attempt,
        opts.initialDelayMs,
        opts.maxDelayMs,
        opts.backoffMultiplier,
        opts.jitterRatio
      );

      if (options.onRetry !== undefined) {
        options.onRetry(attempt, lastError, delayMs);
      }

      await sleep(delayMs);
    }
  }

  // unreachable: the last attempt either returns or throws
  throw lastError ?? new Error('Retry failed');
}
