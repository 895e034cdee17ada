import type { HeaderOptions } from '../types/request.js';

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, string | null]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, string] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merges header sources left to right into a single `Headers` instance.
 * Later sources win; a `null` value removes the header.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value === null) {
        merged.delete(key);
        continue;
      }

      merged.set(key, value);
    }
  }

  return merged;
}
