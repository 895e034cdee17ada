/** Any value that survives a `JSON.stringify` / `JSON.parse` round trip. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** JSON object, the shape of every request body sent to the API. */
export type JsonObject = { [key: string]: JsonValue };
