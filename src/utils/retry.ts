/**
 * Retry logic with exponential backoff
 */

import { CancelledError, isRetryableError, TransportError } from './errors.js';

export interface RetryOptions {
  /** Retries after the first attempt; total attempts are maxRetries + 1 */
  maxRetries: number;
  initialDelay: number;
  maxDelay: number;
  jitter: boolean;
  shouldRetry: (error: unknown) => boolean;
  /** Called before sleeping ahead of retry number `attempt` (1-based) */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  jitter: true,
  shouldRetry: isRetryableError,
};

/**
 * Delay before retry number `attempt` (1-based): initialDelay * 2^(attempt-1),
 * capped at maxDelay. Jitter picks uniformly in [delay/2, delay].
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'jitter'>
): number {
  const exponential = options.initialDelay * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, options.maxDelay);

  if (!options.jitter) {
    return capped;
  }

  return Math.round(capped / 2 + Math.random() * (capped / 2));
}

/**
 * Server-suggested delay wins over the computed one for rate-limited calls
 */
function delayFor(error: unknown, attempt: number, options: RetryOptions): number {
  if (error instanceof TransportError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, options.maxDelay);
  }
  return computeBackoffDelay(attempt, options);
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    throwIfAborted(opts.signal);

    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= opts.maxRetries || !opts.shouldRetry(error)) {
        throw error;
      }

      const delay = delayFor(error, attempt + 1, opts);
      opts.onRetry?.(error, attempt + 1, delay);
      await sleep(delay, opts.signal);
    }
  }
}

/**
 * Sleep for a given number of milliseconds; rejects with CancelledError
 * as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
