import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error matches a specific error class,
 * anywhere along its `cause` chain.
 */
export function isErrorType<T extends Error>(
  // biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any type of class handling, hence the any class-type
  errorClass: new (...args: any[]) => T,
  err: unknown,
): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
