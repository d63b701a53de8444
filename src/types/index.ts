/**
 * Shared value types.
 */

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON object.
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Primitive values accepted as query string parameters.
 * `null` and `undefined` entries are dropped when the URL is built.
 */
export type QueryValue = string | number | boolean | null | undefined;

/**
 * Query string parameters.
 */
export type QueryParams = Record<string, QueryValue>;

/**
 * Supported HTTP methods.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Checks whether a value is a plain JSON object.
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
