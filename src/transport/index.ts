/**
 * HTTP transport: URL and header construction, one request attempt, and
 * classification of its outcome.
 */

import { errors as undiciErrors, type Dispatcher } from 'undici';
import {
  RequestCancelledError,
  TimeoutError,
  TransportError,
  UnexpectedError,
  errorFromStatus,
  isResilientClientError,
  type ResilientClientError,
} from '../errors/index.js';
import type { HttpMethod, JsonValue, QueryParams } from '../types/index.js';

export {
  ConnectionManager,
  createPoolConnection,
  type ConnectionFactory,
  type ConnectionManagerOptions,
  type ConnectionState,
  type ConnectionStats,
} from './connection.js';

/**
 * Node system error codes treated as transport failures.
 */
export const TRANSPORT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ECONNRESET',
  'EPIPE',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

/**
 * undici failures of the connection itself. Other undici errors, such as
 * invalid arguments, are caller mistakes and are not retried.
 */
const CONNECTION_ERROR_TYPES = [
  undiciErrors.ConnectTimeoutError,
  undiciErrors.SocketError,
  undiciErrors.HeadersTimeoutError,
  undiciErrors.BodyTimeoutError,
  undiciErrors.ClientDestroyedError,
  undiciErrors.ClientClosedError,
];

function isConnectionError(error: unknown): boolean {
  return CONNECTION_ERROR_TYPES.some((type) => error instanceof type);
}

/**
 * Form fields sent as `application/x-www-form-urlencoded`.
 */
export type FormParams = Record<string, string | number | boolean>;

/**
 * Request body: JSON or form fields, never both.
 */
export type RequestBody =
  | { json?: JsonValue; form?: undefined }
  | { form: FormParams; json?: undefined };

/**
 * A fully resolved request attempt.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * A classified successful response.
 */
export interface HttpResponse {
  status: number;
  data: JsonValue;
}

/**
 * Joins base URL, endpoint and query. `null` and `undefined` params are dropped.
 */
export function buildUrl(baseUrl: string, endpoint: string, params?: QueryParams): URL {
  const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);

  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) {
        url.searchParams.append(key, String(value));
      }
    }
  }

  return url;
}

/**
 * Header sources, in increasing precedence.
 */
export interface HeaderSources {
  userAgent: string;
  defaultHeaders?: Record<string, string>;
  credential?: string;
  contentType?: string;
  headers?: Record<string, string>;
}

/**
 * Merges headers; later sources replace earlier ones regardless of case.
 */
export function buildHeaders(sources: HeaderSources): Record<string, string> {
  const merged = new Map<string, [string, string]>();
  const put = (name: string, value: string): void => {
    merged.set(name.toLowerCase(), [name, value]);
  };

  put('User-Agent', sources.userAgent);
  put('Accept', 'application/json');
  for (const [name, value] of Object.entries(sources.defaultHeaders ?? {})) {
    put(name, value);
  }
  if (sources.credential !== undefined) {
    put('Authorization', `Bearer ${sources.credential}`);
  }
  if (sources.contentType !== undefined) {
    put('Content-Type', sources.contentType);
  }
  for (const [name, value] of Object.entries(sources.headers ?? {})) {
    put(name, value);
  }

  return Object.fromEntries(merged.values());
}

/**
 * Serializes a request body and names its content type.
 */
export function encodeBody(body: RequestBody): { body?: string; contentType?: string } {
  if (body.form !== undefined) {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(body.form)) {
      form.append(key, String(value));
    }
    return { body: form.toString(), contentType: 'application/x-www-form-urlencoded' };
  }
  if (body.json !== undefined) {
    return { body: JSON.stringify(body.json), contentType: 'application/json' };
  }
  return {};
}

/**
 * Decodes a success body. Empty is `null`; non-JSON text is wrapped.
 */
export function parseBody(text: string): JsonValue {
  if (text.trim() === '') {
    return null;
  }
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return { rawResponse: text };
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Maps a thrown value to a client error.
 */
export function classifyError(error: unknown, signal?: AbortSignal): ResilientClientError {
  if (isResilientClientError(error)) {
    return error;
  }
  if (signal?.aborted) {
    return new RequestCancelledError(signal.reason);
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);
  if (code !== undefined && TRANSPORT_ERROR_CODES.has(code)) {
    return new TransportError(`${code}: ${message}`, error);
  }
  if (isConnectionError(error)) {
    return new TransportError(message, error);
  }

  const cause = error instanceof Error ? error.cause : undefined;
  const causeCode = errorCode(cause);
  if (causeCode !== undefined && TRANSPORT_ERROR_CODES.has(causeCode)) {
    return new TransportError(`${causeCode}: ${message}`, error);
  }

  return new UnexpectedError(message, error);
}

/**
 * Performs one request attempt under `timeoutMs`.
 *
 * @returns The decoded body for statuses below 400
 * @throws {ResilientClientError} Classified by status or failure kind
 */
export async function sendRequest(dispatcher: Dispatcher, request: HttpRequest): Promise<HttpResponse> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, request.timeoutMs);
  const onAbort = (): void => controller.abort(request.signal?.reason);
  request.signal?.addEventListener('abort', onAbort, { once: true });

  let status: number;
  let headers: Record<string, string | string[] | undefined>;
  let text: string;
  try {
    if (request.signal?.aborted) {
      throw new RequestCancelledError(request.signal.reason);
    }

    const response = await dispatcher.request({
      origin: request.url.origin,
      path: `${request.url.pathname}${request.url.search}`,
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    status = response.statusCode;
    headers = response.headers;
    text = await response.body.text();
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(request.timeoutMs, { cause: error });
    }
    throw classifyError(error, request.signal);
  } finally {
    clearTimeout(timer);
    request.signal?.removeEventListener('abort', onAbort);
  }

  if (status >= 400) {
    throw errorFromStatus(status, text, {
      retryAfterHeader: headerValue(headers['retry-after']),
      timeoutMs: request.timeoutMs,
    });
  }

  return { status, data: parseBody(text) };
}
