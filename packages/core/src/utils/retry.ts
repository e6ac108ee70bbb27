import { RETRY_DEFAULTS } from '../constants';
import { QueryTimeoutError, RequestCancelledError } from '../errors';

export interface RetryOptions {
  maxRetries: number;
  retryDelay: number;
  backoffMultiplier?: number;
  maxRetryDelay?: number;
  shouldRetry?: (error: Error) => boolean;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  ...RETRY_DEFAULTS,
  shouldRetry: () => true,
};

export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const shouldRetry = opts.shouldRetry ?? (() => true);
  const maxRetryDelay = opts.maxRetryDelay ?? RETRY_DEFAULTS.maxRetryDelay;
  let delay = opts.retryDelay;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= opts.maxRetries || !shouldRetry(lastError)) {
        throw lastError;
      }

      await sleep(delay);

      if (opts.backoffMultiplier && opts.backoffMultiplier > 1) {
        delay = Math.min(delay * opts.backoffMultiplier, maxRetryDelay);
      }
    }
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message?: string,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new QueryTimeoutError(message || `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Settle with `promise`, or reject with RequestCancelledError as soon as
 * `signal` aborts. The underlying operation is abandoned, not interrupted.
 */
export async function withAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    throw new RequestCancelledError();
  }

  let onAbort: (() => void) | undefined;
  const abortPromise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new RequestCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, abortPromise]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
