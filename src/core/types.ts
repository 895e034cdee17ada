import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { JsonObject } from '../types/json.js';
import type { SendOptions } from '../types/request.js';
import type { endpoints } from './endpoints.js';

/** Schema validating a method's parameters into a JSON object. */
export type ParamsSchema = StandardSchemaV1<unknown, JsonObject>;

/** Definition of one API method. */
export interface EndpointDefinition {
  /** Schema of the camelCase parameters; defaults and caps are applied by it. */
  params: ParamsSchema;
  /** Fields sent verbatim with every request to the endpoint. */
  fixed?: JsonObject;
}

/** Map of endpoint name to definition. */
export type EndpointDefinitions = Record<string, EndpointDefinition>;

/** The API methods the client knows. */
export type Endpoints = typeof endpoints;

/** Name of an API method, also its URL path segment. */
export type EndpointName = keyof Endpoints & string;

/** Parameters a caller passes for an endpoint, before defaults are applied. */
export type EndpointParams<Endpoint extends EndpointName> = StandardSchemaV1.InferInput<Endpoints[Endpoint]['params']>;

/** Options for {@link NftScanClient.call}. */
export interface CallOptions extends SendOptions {
  /** Resolve with the transport response instead of the envelope `data`. */
  raw?: boolean;
}
