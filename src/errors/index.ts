/**
 * Error types for the resilient API client.
 *
 * Every failure surfaced by the client is a `ResilientClientError`. The
 * `retryable` flag drives the retry loop; `attempts` and `elapsedMs` are
 * attached by the client before the error reaches the caller.
 */

/**
 * Error codes for client errors.
 */
export enum ErrorCode {
  // Configuration
  Configuration = 'CONFIGURATION_ERROR',

  // Client errors (4xx)
  BadRequest = 'BAD_REQUEST',
  Unauthorized = 'UNAUTHORIZED',
  Forbidden = 'FORBIDDEN',
  NotFound = 'NOT_FOUND',
  ClientError = 'CLIENT_ERROR',

  // Rate limiting
  RateLimited = 'RATE_LIMITED',
  RateLimitTimeout = 'RATE_LIMIT_TIMEOUT',

  // Server and transport
  ServerError = 'SERVER_ERROR',
  Timeout = 'TIMEOUT',
  Transport = 'TRANSPORT_ERROR',

  // Everything else
  Unexpected = 'UNEXPECTED_ERROR',
  Cancelled = 'CANCELLED',
  ClientClosed = 'CLIENT_CLOSED',
}

/** Maximum length of a response body kept on an error. */
export const MAX_BODY_EXCERPT_LENGTH = 500;

/**
 * Options accepted by the base error constructor.
 */
export interface ResilientClientErrorOptions {
  code: ErrorCode;
  message: string;
  statusCode?: number;
  retryable?: boolean;
  retryAfterMs?: number;
  bodyExcerpt?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error class.
 */
export class ResilientClientError extends Error {
  /** Error code */
  readonly code: ErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Server-requested delay before retrying */
  readonly retryAfterMs?: number;
  /** First part of the response body */
  readonly bodyExcerpt?: string;
  /** Additional error details */
  readonly details?: Record<string, unknown>;
  /** Network attempts made before this error was raised */
  attempts?: number;
  /** Wall-clock time spent on the request */
  elapsedMs?: number;

  constructor(options: ResilientClientErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResilientClientError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.bodyExcerpt = options.bodyExcerpt;
    this.details = options.details;
  }

  /**
   * Records how many attempts were made and how long they took.
   */
  withAttempts(attempts: number, elapsedMs: number): this {
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    return this;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      attempts: this.attempts,
      elapsedMs: this.elapsedMs,
      bodyExcerpt: this.bodyExcerpt,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

/**
 * Invalid client configuration, raised synchronously at construction.
 */
export class ConfigurationError extends ResilientClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ErrorCode.Configuration,
      message: `Configuration error: ${message}`,
      retryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Client Errors (Non-Retryable)
// ============================================================================

/**
 * The server rejected the request with a 4xx status.
 */
export class ClientError extends ResilientClientError {
  constructor(options: {
    statusCode: number;
    message: string;
    bodyExcerpt?: string;
    code?: ErrorCode;
  }) {
    super({
      code: options.code ?? ErrorCode.ClientError,
      message: options.message,
      statusCode: options.statusCode,
      retryable: false,
      bodyExcerpt: options.bodyExcerpt,
    });
    this.name = 'ClientError';
  }
}

/**
 * 400 Bad Request.
 */
export class BadRequestError extends ClientError {
  constructor(message: string, bodyExcerpt?: string) {
    super({ statusCode: 400, message, bodyExcerpt, code: ErrorCode.BadRequest });
    this.name = 'BadRequestError';
  }
}

/**
 * 401 Unauthorized.
 */
export class UnauthorizedError extends ClientError {
  constructor(message: string = 'Invalid or missing credentials', bodyExcerpt?: string) {
    super({ statusCode: 401, message, bodyExcerpt, code: ErrorCode.Unauthorized });
    this.name = 'UnauthorizedError';
  }
}

/**
 * 403 Forbidden.
 */
export class ForbiddenError extends ClientError {
  constructor(message: string = 'Access to the resource is forbidden', bodyExcerpt?: string) {
    super({ statusCode: 403, message, bodyExcerpt, code: ErrorCode.Forbidden });
    this.name = 'ForbiddenError';
  }
}

/**
 * 404 Not Found.
 */
export class NotFoundError extends ClientError {
  constructor(message: string, bodyExcerpt?: string) {
    super({ statusCode: 404, message, bodyExcerpt, code: ErrorCode.NotFound });
    this.name = 'NotFoundError';
  }
}

// ============================================================================
// Rate Limiting Errors (Retryable)
// ============================================================================

/**
 * 429 Too Many Requests.
 */
export class RateLimitedError extends ResilientClientError {
  constructor(retryAfterMs?: number, bodyExcerpt?: string) {
    super({
      code: ErrorCode.RateLimited,
      message:
        retryAfterMs !== undefined
          ? `Rate limited by server, retry after ${retryAfterMs}ms`
          : 'Rate limited by server',
      statusCode: 429,
      retryable: true,
      retryAfterMs,
      bodyExcerpt,
    });
    this.name = 'RateLimitedError';
  }
}

/**
 * The local rate limiter could not admit the request within its wait bound.
 */
export class RateLimitTimeoutError extends ResilientClientError {
  constructor(waitedMs: number, maxWaitMs: number) {
    super({
      code: ErrorCode.RateLimitTimeout,
      message: `Rate limit wait (${waitedMs}ms) exceeds maximum (${maxWaitMs}ms)`,
      retryable: true,
      details: { waitedMs, maxWaitMs },
    });
    this.name = 'RateLimitTimeoutError';
  }
}

// ============================================================================
// Server and Transport Errors (Retryable)
// ============================================================================

/**
 * 5xx response.
 */
export class ServerError extends ResilientClientError {
  constructor(statusCode: number, message: string = 'Server error', bodyExcerpt?: string) {
    super({
      code: ErrorCode.ServerError,
      message,
      statusCode,
      retryable: true,
      bodyExcerpt,
    });
    this.name = 'ServerError';
  }
}

/**
 * The request did not complete within the configured timeout.
 */
export class TimeoutError extends ResilientClientError {
  readonly timeoutMs: number;

  constructor(
    timeoutMs: number,
    options: { statusCode?: number; bodyExcerpt?: string; cause?: unknown } = {}
  ) {
    super({
      code: ErrorCode.Timeout,
      message:
        options.statusCode === 408
          ? `Server reported request timeout (408), client timeout is ${timeoutMs}ms`
          : `Request timeout after ${timeoutMs}ms`,
      statusCode: options.statusCode,
      retryable: true,
      bodyExcerpt: options.bodyExcerpt,
      details: { timeoutMs },
      cause: options.cause,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection-level failure (DNS, refused, reset).
 */
export class TransportError extends ResilientClientError {
  constructor(message: string, cause?: unknown) {
    super({
      code: ErrorCode.Transport,
      message: `Transport error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'TransportError';
  }
}

// ============================================================================
// Other Errors (Non-Retryable)
// ============================================================================

/**
 * Anything that does not match a known failure kind.
 */
export class UnexpectedError extends ResilientClientError {
  constructor(message: string, cause?: unknown) {
    super({
      code: ErrorCode.Unexpected,
      message: `Unexpected error: ${message}`,
      retryable: false,
      cause,
    });
    this.name = 'UnexpectedError';
  }
}

/**
 * The caller aborted the request.
 */
export class RequestCancelledError extends ResilientClientError {
  constructor(reason?: unknown) {
    super({
      code: ErrorCode.Cancelled,
      message: 'Request was cancelled',
      retryable: false,
      cause: reason,
    });
    this.name = 'RequestCancelledError';
  }
}

/**
 * The client was closed before or during the request.
 */
export class ClientClosedError extends ResilientClientError {
  constructor() {
    super({
      code: ErrorCode.ClientClosed,
      message: 'Client is closed',
      retryable: false,
    });
    this.name = 'ClientClosedError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Truncates a response body for inclusion in an error.
 */
export function toBodyExcerpt(body: string): string | undefined {
  if (body.length === 0) {
    return undefined;
  }
  return body.length > MAX_BODY_EXCERPT_LENGTH
    ? `${body.slice(0, MAX_BODY_EXCERPT_LENGTH)}...`
    : body;
}

/**
 * Parses a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | undefined, now: number = Date.now()): number | undefined {
  if (header === undefined || header.trim() === '') {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Maps a non-success HTTP status to the matching error.
 */
export function errorFromStatus(
  statusCode: number,
  body: string,
  options: { retryAfterHeader?: string; timeoutMs?: number } = {}
): ResilientClientError {
  const bodyExcerpt = toBodyExcerpt(body);
  const message = `API request failed with status ${statusCode}`;

  switch (statusCode) {
    case 400:
      return new BadRequestError(message, bodyExcerpt);
    case 401:
      return new UnauthorizedError(message, bodyExcerpt);
    case 403:
      return new ForbiddenError(message, bodyExcerpt);
    case 404:
      return new NotFoundError(message, bodyExcerpt);
    case 408:
      return new TimeoutError(options.timeoutMs ?? 0, { statusCode, bodyExcerpt });
    case 429:
      return new RateLimitedError(parseRetryAfter(options.retryAfterHeader), bodyExcerpt);
    default:
      if (statusCode >= 500) {
        return new ServerError(statusCode, message, bodyExcerpt);
      }
      return new ClientError({ statusCode, message, bodyExcerpt });
  }
}

/**
 * Checks if an error is a client error.
 */
export function isResilientClientError(error: unknown): error is ResilientClientError {
  return error instanceof ResilientClientError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  return isResilientClientError(error) && error.retryable;
}
