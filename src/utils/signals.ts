import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { type SafeWrap, type SafeWrapAsync, toError } from './wrap.js';

/** Combined abort signal for one request, with a hook to release its timer and listeners. */
export interface LinkedSignal {
  /** Aborts when any source aborts or the timeout elapses; `null` when there is nothing to link. */
  signal: AbortSignal | null;
  /** Clears the timeout and detaches from the source signals. Call once the request settles. */
  release: () => void;
}

/**
 * Links the given signals and an optional timeout into a single {@link AbortSignal}.
 *
 * - The timeout aborts with a {@link TimeoutError}; `false` or `0` disables it.
 * - A source signal's `reason` is preserved, falling back to an {@link AbortError}.
 * - A source that is already aborted aborts the linked signal immediately.
 */
export function linkSignals(
  signals: Array<AbortSignal | null | undefined>,
  timeoutMs?: number | false,
): LinkedSignal {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);
  if (active.length === 0 && !timeoutMs) {
    return { signal: null, release: () => {} };
  }

  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  const release = () => {
    for (const cleanup of cleanups.splice(0)) {
      cleanup();
    }
  };

  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
    release();
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      return { signal: controller.signal, release };
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    cleanups.push(() => signal.removeEventListener('abort', abort));
  }

  if (timeoutMs) {
    const timeout = setTimeout(() => {
      controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`));
      release();
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timeout));
  }

  return { signal: controller.signal, release };
}

/**
 * Waits for a shared pending result, giving up when one of the given signals aborts
 * or the timeout elapses. Giving up ends only this wait; `pending` keeps running.
 */
export async function raceSignals<T>(
  pending: SafeWrapAsync<Error, T>,
  signals: Array<AbortSignal | null | undefined>,
  timeoutMs?: number | false,
): SafeWrapAsync<Error, T> {
  const { signal, release } = linkSignals(signals, timeoutMs);
  if (!signal) {
    return pending;
  }

  try {
    if (signal.aborted) {
      return [toError(signal.reason), null];
    }

    const aborted = new Promise<SafeWrap<Error, T>>((resolve) => {
      signal.addEventListener('abort', () => resolve([toError(signal.reason), null]), { once: true });
    });

    return await Promise.race([pending, aborted]);
  } finally {
    release();
  }
}
