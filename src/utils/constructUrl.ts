import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/**
 * Joins a base URL and path segments with exactly one slash between each part.
 *
 * @example
 * constructUrl('https://restapi.nftscan.com/api/', ['v1', 'getSingleNft']);
 * // 'https://restapi.nftscan.com/api/v1/getSingleNft'
 */
export function constructUrl(
  baseUrl: string,
  segments: string[],
  search?: Record<string, string>,
): SafeWrap<Error, string> {
  const path = [baseUrl.replace(/\/+$/, ''), ...segments.map((segment) => segment.replace(/^\/+|\/+$/g, ''))]
    .filter(Boolean)
    .join('/');

  if (!URL.canParse(path)) {
    return [new ConstructURLError('error constructing URL, not absolute', path), null];
  }

  const url = new URL(path);
  for (const [key, value] of Object.entries(search ?? {})) {
    url.searchParams.set(key, value);
  }

  return [null, url.toString()];
}

/** Drops the query string, which may carry credentials, so a URL is safe to log or report. */
export function redactUrl(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}
