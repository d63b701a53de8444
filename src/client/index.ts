/**
 * Resilient HTTP client: response caching, client-side rate limiting,
 * retry with exponential backoff, and lazy connection management.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Dispatcher } from 'undici';
import { CACHE_MISS, ResponseCache, type CacheKeyParams, type CacheStats } from '../cache/index.js';
import { resolveConfig, type ClientConfig, type ClientConfigInput } from '../config/index.js';
import { ClientClosedError, isResilientClientError } from '../errors/index.js';
import {
  MetricNames,
  NoopLogger,
  NoopMetricsCollector,
  NoopTracer,
  type Logger,
  type MetricsCollector,
  type Span,
  type Tracer,
} from '../observability/index.js';
import { RateLimiter } from '../resilience/rate-limiter.js';
import { RetryExecutor } from '../resilience/retry.js';
import {
  ConnectionManager,
  buildHeaders,
  buildUrl,
  classifyError,
  encodeBody,
  sendRequest,
  type ConnectionFactory,
  type ConnectionStats,
  type HttpRequest,
  type HttpResponse,
  type RequestBody,
} from '../transport/index.js';
import type { HttpMethod, JsonValue, QueryParams } from '../types/index.js';

/**
 * Client construction options.
 */
export interface ClientOptions extends ClientConfigInput {
  /** Caller-owned dispatcher; used as-is and never closed by the client */
  connection?: Dispatcher;
  /** Creates the dispatcher on first use; defaults to an undici Pool */
  connectionFactory?: ConnectionFactory;
  logger?: Logger;
  metrics?: MetricsCollector;
  tracer?: Tracer;
  /** Source of randomness for backoff jitter */
  random?: () => number;
}

/**
 * Per-call options shared by every method.
 */
export interface CallOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  /** Skip the cache lookup; a successful GET still refreshes the entry */
  skipCache?: boolean;
  /** TTL for the cached response, overriding the cache default */
  cacheTtlMs?: number;
  signal?: AbortSignal;
}

/**
 * A full request description.
 */
export type RequestOptions = CallOptions &
  RequestBody & {
    method: HttpMethod;
    endpoint: string;
  };

/**
 * Snapshot of the client's moving parts.
 */
export interface ClientHealth {
  connection: ConnectionStats;
  cache?: CacheStats;
  rateLimiter: {
    waitTimeMs: number;
    tokens: number;
  };
}

/**
 * Cache key params for the query of `url`: the endpoint's own query plus the
 * caller's params, as sent. Repeated names become arrays.
 */
function queryKeyParams(url: URL): CacheKeyParams {
  const grouped = new Map<string, string[]>();
  for (const [name, value] of url.searchParams) {
    const values = grouped.get(name);
    if (values) {
      values.push(value);
    } else {
      grouped.set(name, [value]);
    }
  }

  const params: CacheKeyParams = {};
  for (const [name, values] of grouped) {
    params[name] = values.length === 1 ? values[0] : values;
  }
  return params;
}

/**
 * HTTP client for JSON APIs.
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   baseUrl: 'https://api.example.com/v1',
 *   credential: process.env.API_KEY,
 *   rateLimit: { callsPerPeriod: 10, periodMs: 1000 },
 * });
 *
 * const places = await client.get('/places/near', { lat: 35.0, lng: 139.0 });
 * await client.close();
 * ```
 */
export class ResilientClient {
  private readonly config: ClientConfig;
  private readonly connection: ConnectionManager;
  private readonly rateLimiter: RateLimiter;
  private readonly cache?: ResponseCache<JsonValue>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly tracer: Tracer;
  private readonly random?: () => number;
  private closed = false;

  /**
   * @throws {ConfigurationError} If the options are invalid.
   */
  constructor(options: ClientOptions) {
    this.config = resolveConfig(options);
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.tracer = options.tracer ?? new NoopTracer();
    this.random = options.random;

    this.rateLimiter = new RateLimiter(this.config.rateLimit, this.logger.child({ component: 'rate-limiter' }));

    if (this.config.cache.enabled) {
      this.cache = new ResponseCache<JsonValue>(
        {
          defaultTtlMs: this.config.cache.ttlMs,
          maxSize: this.config.cache.maxSize,
          cleanupIntervalMs: this.config.cache.cleanupIntervalMs,
        },
        this.logger.child({ component: 'cache' })
      );
    }

    this.connection = new ConnectionManager({
      origin: new URL(this.config.baseUrl).origin,
      pool: this.config.pool,
      connection: options.connection,
      factory: options.connectionFactory,
      logger: this.logger.child({ component: 'connection' }),
    });

    this.logger.info('Resilient client initialized', {
      baseUrl: this.config.baseUrl,
      timeoutMs: this.config.timeoutMs,
      maxRetries: this.config.maxRetries,
      cacheEnabled: this.config.cache.enabled,
      hasCredential: this.config.credential !== undefined,
    });
  }

  /**
   * Sends a request and returns the decoded JSON payload.
   *
   * Successful GETs are cached when caching is enabled. Retryable failures
   * are retried up to `maxRetries` total attempts.
   *
   * @throws {ResilientClientError} With `attempts` and `elapsedMs` set.
   */
  async request(options: RequestOptions): Promise<JsonValue> {
    const { method, endpoint, params, signal } = options;
    const requestId = uuidv4();
    const logger = this.logger.child({ requestId });
    const startTime = Date.now();
    const url = buildUrl(this.config.baseUrl, endpoint, params);
    const resourceUrl = `${url.origin}${url.pathname}`;
    let attempts = 0;

    const span = this.tracer.startSpan(`http.${method}`, {
      'http.method': method,
      'http.url': resourceUrl,
      'request.id': requestId,
    });
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, { method });

    try {
      if (this.closed) {
        throw new ClientClosedError();
      }

      const cacheKey =
        method === 'GET' && this.cache !== undefined
          ? this.cache.generateKey(resourceUrl, queryKeyParams(url))
          : undefined;

      if (cacheKey !== undefined && this.cache !== undefined && options.skipCache !== true) {
        const cachedValue = this.cache.get(cacheKey);
        if (cachedValue !== CACHE_MISS) {
          this.metrics.incrementCounter(MetricNames.CACHE_HITS, 1, { method });
          span.setAttribute('cache.hit', true);
          span.setAttribute('http.attempts', 0);
          logger.debug('Serving response from cache', { method, url: resourceUrl });
          this.finishSuccess(span, method, startTime);
          return cachedValue;
        }
        this.metrics.incrementCounter(MetricNames.CACHE_MISSES, 1, { method });
      }
      span.setAttribute('cache.hit', false);

      const encoded = encodeBody(options);
      const headers = buildHeaders({
        userAgent: this.config.userAgent,
        defaultHeaders: this.config.defaultHeaders,
        credential: this.config.credential?.expose(),
        contentType: encoded.contentType,
        headers: options.headers,
      });

      const executor = new RetryExecutor(
        { ...this.config.retry, maxAttempts: this.config.maxRetries, random: this.random },
        {
          onRetry: (attempt, error, delayMs) => {
            this.metrics.incrementCounter(MetricNames.RETRIES, 1, { method });
            span.addEvent('retry', { attempt, delayMs });
            logger.warn('Request failed, retrying', {
              method,
              url: resourceUrl,
              attempt,
              maxAttempts: this.config.maxRetries,
              delayMs: Math.round(delayMs),
              error: error.message,
            });
          },
          onExhausted: (error, attemptsMade) => {
            logger.error('Request failed after all retry attempts', {
              method,
              url: resourceUrl,
              attempts: attemptsMade,
              error: error.message,
            });
          },
        }
      );

      const response = await executor.execute(async () => {
        attempts++;
        return this.attempt(
          { method, url, headers, body: encoded.body, timeoutMs: this.config.timeoutMs, signal },
          logger
        );
      }, signal);

      if (cacheKey !== undefined && this.cache !== undefined) {
        this.cache.set(cacheKey, response.data, options.cacheTtlMs);
        this.metrics.setGauge(MetricNames.CACHE_ENTRIES, this.cache.getStats().size);
      }

      span.setAttribute('http.status_code', response.status);
      span.setAttribute('http.attempts', attempts);
      logger.debug('Request succeeded', {
        method,
        url: resourceUrl,
        status: response.status,
        attempts,
      });
      this.finishSuccess(span, method, startTime);
      return response.data;
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      if (isResilientClientError(error)) {
        if (error.attempts === undefined) {
          error.withAttempts(attempts, elapsedMs);
        }
        if (error.statusCode !== undefined) {
          span.setAttribute('http.status_code', error.statusCode);
        }
        if (!error.retryable) {
          logger.error('Request failed', {
            method,
            url: resourceUrl,
            code: error.code,
            statusCode: error.statusCode,
            attempts: error.attempts,
          });
        }
      }

      span.setAttribute('http.attempts', attempts);
      span.setStatus('error', error instanceof Error ? error.message : String(error));
      span.end();
      this.metrics.incrementCounter(MetricNames.REQUESTS_FAILED, 1, { method });
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, elapsedMs / 1000, { method });
      throw error;
    }
  }

  /**
   * GET request. Cached when caching is enabled.
   */
  async get(endpoint: string, params?: QueryParams, options: Omit<CallOptions, 'params'> = {}): Promise<JsonValue> {
    return this.request({ ...options, method: 'GET', endpoint, params });
  }

  async post(endpoint: string, json?: JsonValue, options: CallOptions = {}): Promise<JsonValue> {
    return this.request({ ...options, method: 'POST', endpoint, json });
  }

  async put(endpoint: string, json?: JsonValue, options: CallOptions = {}): Promise<JsonValue> {
    return this.request({ ...options, method: 'PUT', endpoint, json });
  }

  async patch(endpoint: string, json?: JsonValue, options: CallOptions = {}): Promise<JsonValue> {
    return this.request({ ...options, method: 'PATCH', endpoint, json });
  }

  async delete(endpoint: string, options: CallOptions = {}): Promise<JsonValue> {
    return this.request({ ...options, method: 'DELETE', endpoint });
  }

  /**
   * Closes the owned connection and stops the cache sweep. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.cache?.dispose();
    await this.connection.close();
    this.logger.info('Resilient client closed');
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Cache statistics, or `undefined` when caching is disabled.
   */
  getCacheStats(): CacheStats | undefined {
    return this.cache?.getStats();
  }

  /**
   * Drops every cached response.
   */
  clearCache(): void {
    if (this.cache !== undefined) {
      this.cache.clear();
      this.metrics.setGauge(MetricNames.CACHE_ENTRIES, 0);
    }
  }

  getRateLimiter(): RateLimiter {
    return this.rateLimiter;
  }

  getConfig(): Readonly<ClientConfig> {
    return this.config;
  }

  getHealth(): ClientHealth {
    return {
      connection: this.connection.getStats(),
      cache: this.cache?.getStats(),
      rateLimiter: {
        waitTimeMs: this.rateLimiter.getWaitTime(),
        tokens: this.rateLimiter.getTokens(),
      },
    };
  }

  private async attempt(request: HttpRequest, logger: Logger): Promise<HttpResponse> {
    const waitMs = this.rateLimiter.getWaitTime();
    if (waitMs > 0) {
      this.metrics.incrementCounter(MetricNames.RATE_LIMIT_WAITS, 1, { method: request.method });
      logger.debug('Waiting for rate limiter', { waitMs });
    }
    await this.rateLimiter.acquire(1, request.signal);
    this.metrics.setGauge(MetricNames.RATE_LIMIT_TOKENS, this.rateLimiter.getTokens());

    let dispatcher: Dispatcher;
    try {
      dispatcher = await this.connection.acquire();
    } catch (error) {
      throw classifyError(error, request.signal);
    }

    return sendRequest(dispatcher, request);
  }

  private finishSuccess(span: Span, method: HttpMethod, startTime: number): void {
    span.setStatus('ok');
    span.end();
    this.metrics.incrementCounter(MetricNames.REQUESTS_SUCCESS, 1, { method });
    this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, (Date.now() - startTime) / 1000, { method });
  }
}

/**
 * Creates a resilient client.
 * @throws {ConfigurationError} If the options are invalid.
 */
export function createClient(options: ClientOptions): ResilientClient {
  return new ResilientClient(options);
}
