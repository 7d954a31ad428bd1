/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt (capped at maxDelayMs). Jitter adds
 * +/- jitterFraction randomness so concurrent retries spread out.
 *
 * Used for every retried store write: blob inserts, vector upserts and
 * reconciliation scheduling.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 200) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 200,
  maxDelayMs: 10000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Aborts the wait between attempts and stops further attempts */
  signal?: AbortSignal;
  /** Log tag for the wait message */
  label?: string;
  /** Called after each failed attempt that will be retried */
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Calculate delay for a given attempt (0-indexed) with jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 *
 * @returns Delay in milliseconds (always >= 0)
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

/**
 * Execute a function with automatic retry and exponential backoff.
 *
 * Retries on errors that pass the shouldRetry predicate, up to maxAttempts.
 * Non-retryable errors are re-thrown immediately.
 *
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, label = 'Backoff', onRetry, ...config } = options;
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    if (signal?.aborted) throw abortReason(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        onRetry?.(error, attempt);
        const delay = calculateBackoffDelay(attempt, cfg);
        console.error(`[${label}] Attempt ${attempt + 1} failed, retrying in ${delay}ms`);
        await sleep(delay, signal);
      }
    }
  }

  throw lastError;
}
