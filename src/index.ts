/**
 * Resilient API client.
 *
 * A request layer for third-party JSON APIs with response caching,
 * client-side rate limiting, retry with exponential backoff, and lazy
 * connection management.
 *
 * @example
 * ```typescript
 * import { createClient, ClientConfigBuilder } from 'resilient-api-client';
 *
 * const client = createClient({ ...ClientConfigBuilder.fromEnv().build() });
 * const forecast = await client.get('/forecast', { city: 'Osaka' });
 * ```
 *
 * @packageDocumentation
 */

// Client
export {
  ResilientClient,
  createClient,
  type CallOptions,
  type ClientHealth,
  type ClientOptions,
  type RequestOptions,
} from './client/index.js';

// Cache
export {
  CACHE_MISS,
  ResponseCache,
  generateCacheKey,
  stableStringify,
  type CacheKeyParams,
  type CacheStats,
  type CachedOptions,
  type ResponseCacheOptions,
} from './cache/index.js';

// Resilience
export {
  Mutex,
  RateLimiter,
  RetryExecutor,
  computeBackoffDelay,
  computeRetryDelay,
  createRateLimiter,
  sleep,
  type RateLimiterOptions,
  type RateLimiterStats,
  type RetryExecutorOptions,
  type RetryHooks,
} from './resilience/index.js';

// Transport
export {
  ConnectionManager,
  buildHeaders,
  buildUrl,
  classifyError,
  createPoolConnection,
  type ConnectionFactory,
  type ConnectionState,
  type ConnectionStats,
  type FormParams,
  type RequestBody,
} from './transport/index.js';

// Configuration
export {
  ClientConfigBuilder,
  SecretString,
  resolveConfig,
  baseUrlSchema,
  rateLimitConfigSchema,
  cacheConfigSchema,
  retryConfigSchema,
  poolConfigSchema,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_MAX_RETRIES,
  DEFAULT_POOL_CONFIG,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  type CacheConfig,
  type ClientConfig,
  type ClientConfigInput,
  type PoolConfig,
  type RateLimitConfig,
  type RetryConfig,
} from './config/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Types
export type { HttpMethod, JsonObject, JsonValue, QueryParams, QueryValue } from './types/index.js';
export { isJsonObject } from './types/index.js';
