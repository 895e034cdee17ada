/**
 * Core entrypoint: exports the NFTScan client and its endpoint types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Constructor and runtime options accepted by {@link NftScanClient}.
 */
export type { NftScanClientOptions, NftScanClientProps } from './client.js';

/**
 * Client for the NFTScan REST API, with one typed method per endpoint.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export { NftScanClient } from './client.js';

/** Endpoint table and page size cap. */
export { endpoints, MAX_PAGE_SIZE } from './endpoints.js';

/** Endpoint names, parameters and call options. */
export type { CallOptions, EndpointDefinition, EndpointName, EndpointParams } from './types.js';
