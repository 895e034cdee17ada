import { writeFile } from 'node:fs/promises';
import { ExportError } from '../error/exportError.js';
import type { JsonValue } from '../types/json.js';
import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * Writes a payload as JSON to `path`, replacing any existing file.
 */
export async function exportFile(path: string, data: JsonValue): SafeWrapAsync<Error, string> {
  const [err] = await safeWrapAsync(() => writeFile(path, JSON.stringify(data), 'utf-8'));
  if (err) {
    return [new ExportError(`error exporting response to ${path}`, path, { cause: err }), null];
  }

  return [null, path];
}
