import type { SafeWrapAsync } from './wrap.js';

/** Options for retry-function */
export interface RetryOptions<R> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /**
   * Runs between a failed attempt and the next one (e.g. re-authentication).
   * An error here ends the loop and is surfaced instead of the attempt's error.
   */
  beforeRetry?: (e: Error, attempt: number) => SafeWrapAsync<Error, unknown>;
}

/**
 * Retry-function to re-run a function that returns its errors in a tuple `[Error, Response]`.
 *
 * Errors are surfaced as-is: the caller receives the error of the last attempt made,
 * never the error of an earlier one and never a wrapper.
 */
export async function retry<R = unknown>({ fn, attempts = 1, errFn, beforeRetry }: RetryOptions<R>): SafeWrapAsync<
  Error,
  R
> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    if (attempt > attempts || errFn?.(err)) {
      return [err, null];
    }

    if (beforeRetry) {
      const [errBefore] = await beforeRetry(err, attempt);
      if (errBefore) {
        return [errBefore, null];
      }
    }
  }
}
