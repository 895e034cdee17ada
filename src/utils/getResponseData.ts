import { z } from 'zod';
import { isAbortError } from '../error/abortError.js';
import { getMalformedResponseError, MalformedResponseError } from '../error/malformedResponseError.js';
import { statusErrorFor } from '../error/statusError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import type { FetchResponse } from '../types/request.js';
import type { JsonValue } from '../types/json.js';
import { validator } from './validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Decoded body plus the text it was decoded from. */
export interface ResponseBody {
  json: unknown;
  text: string;
}

/** The `{ code, data }` wrapper around every API payload. */
export const envelopeSchema = z.object({
  code: z.number(),
  data: z.custom<JsonValue>((value) => value !== undefined, 'Required'),
});

export type Envelope = z.output<typeof envelopeSchema>;

/**
 * Reads the response body and decodes it as JSON regardless of `Content-Type`,
 * since the API does not label its responses reliably.
 *
 * An unreadable body, an empty body, or invalid JSON is a {@link MalformedResponseError}.
 * A timeout or abort while reading is returned as is.
 */
export async function getResponseData(response: FetchResponse): SafeWrapAsync<Error, ResponseBody> {
  // Read a clone as text, leaving the original body unread for callers asking for the raw response
  const [errText, text] = await safeWrapAsync(() => response.clone().text());
  if (errText) {
    if (isTimeoutError(errText) || isAbortError(errText)) {
      return [errText, null];
    }

    return [new MalformedResponseError('error reading response body', '', { cause: errText }), null];
  }

  if (!text) {
    return [new MalformedResponseError('error empty response body', text), null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new MalformedResponseError('error parsing json response body', text, { cause: errJson }), null];
  }

  return [null, { json, text }];
}

/**
 * Reads the response body like {@link getResponseData}, after mapping the HTTP status
 * to a typed error. A failure status wins over an unreadable body.
 */
export async function getResponseBody(response: FetchResponse): SafeWrapAsync<Error, ResponseBody> {
  const [errBody, body] = await getResponseData(response);

  const httpError = statusErrorFor(response.status, 'http', body?.text ?? getMalformedResponseError(errBody)?.body ?? '');
  if (httpError) {
    return [httpError, null];
  }

  if (errBody) {
    return [errBody, null];
  }

  return [null, body];
}

/**
 * Applies the dual status convention to a response:
 *
 * 1. the HTTP status is mapped to a typed error first,
 * 2. the body must be an envelope with `code` and `data`,
 * 3. the envelope `code` is mapped through the same table.
 *
 * Either status may fire; on success the envelope is returned.
 */
export async function getEnvelope(response: FetchResponse): SafeWrapAsync<Error, Envelope> {
  const [errBody, body] = await getResponseBody(response);
  if (errBody) {
    return [errBody, null];
  }

  return parseEnvelope(body);
}

/**
 * Validates a decoded body as an envelope and maps its `code`.
 */
export async function parseEnvelope(body: ResponseBody): SafeWrapAsync<Error, Envelope> {
  const [errEnvelope, envelope] = await validator(body.json, envelopeSchema);
  if (errEnvelope) {
    return [
      new MalformedResponseError('error response is missing code or data', body.text, { cause: errEnvelope }),
      null,
    ];
  }

  const envelopeError = statusErrorFor(envelope.code, 'envelope', body.text);
  if (envelopeError) {
    return [envelopeError, null];
  }

  return [null, envelope];
}
