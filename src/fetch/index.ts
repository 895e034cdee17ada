/**
 * Fetch entrypoint: exports the fetch client and supporting types.
 * @module
 */
export { FetchClient } from './client.js';
export type { FetchClientOptions } from './client.js';
export type { FetchOptions, FetchResponse } from '../types/request.js';
