import { isNotFoundError } from './errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts after the first call (default: 3) */
  maxRetries: number;
  /** Fixed delay between attempts in milliseconds (default: 5000) */
  delayMs: number;
  /** Callback invoked before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  isRetryable?: (error: Error) => boolean;
  /** Sleep implementation, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  delayMs: 5000,
};

/**
 * Every failure is retryable except not-found (HTTP 404), which means the
 * resource or capability does not exist and will not appear on retry.
 */
export function isRetryableError(error: Error): boolean {
  return !isNotFoundError(error);
}

/**
 * Executes a function with a bounded, fixed-delay retry policy.
 *
 * - At most `maxRetries + 1` attempts
 * - Same `delayMs` sleep between every attempt (no backoff growth)
 * - Non-retryable errors are rethrown after the attempt that raised them
 * - Exhausting retries rethrows the last underlying error
 *
 * @example
 * const groups = await withRetry(
 *   () => fetchGroups(),
 *   {
 *     maxRetries: 3,
 *     delayMs: 5000,
 *     onRetry: (error, attempt) => log.warn('Retrying', { attempt, error: error.message }),
 *   }
 * );
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const isRetryable = opts.isRetryable ?? isRetryableError;
  const wait = opts.sleep ?? sleep;
  let lastError: Error = new Error('withRetry: no attempt made');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(lastError)) {
        throw lastError;
      }

      if (attempt < opts.maxRetries) {
        opts.onRetry?.(lastError, attempt + 1, opts.delayMs);
        await wait(opts.delayMs);
      }
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
