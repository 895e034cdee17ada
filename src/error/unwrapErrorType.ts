/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Matches by `instanceof`, by `name`, or by a message prefixed with the class name,
 * so errors that crossed a realm boundary (e.g. a `DOMException` named `AbortError`)
 * still match.
 */
export function unwrapErrorType<T extends Error>(
  // biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any type of class handling, hence the any class-type
  errorClass: new (...args: any[]) => T,
  err: unknown,
): T | null {
  const seen = new Set<unknown>();
  let current = err;
  while (current instanceof Error && !seen.has(current)) {
    if (
      current instanceof errorClass ||
      current.name === errorClass.name ||
      (errorClass.name && current.message.startsWith(errorClass.name))
    ) {
      return current as T;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
