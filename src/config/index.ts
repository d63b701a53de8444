/**
 * Configuration types, defaults and validation for the resilient client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// Secret String
// ============================================================================

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  /**
   * Returns a safe representation for logging.
   */
  toString(): string {
    return '[REDACTED]';
  }

  /**
   * Custom JSON serialization to prevent accidental exposure.
   */
  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Default Constants
// ============================================================================

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Default number of network attempts per request. */
export const DEFAULT_MAX_RETRIES = 3;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'resilient-api-client/0.1.0';

/** Schemes a base URL may use. */
export const ALLOWED_SCHEMES: ReadonlySet<string> = new Set(['http:', 'https:']);

// ============================================================================
// Section Types
// ============================================================================

/**
 * Token bucket settings.
 */
export interface RateLimitConfig {
  /** Calls admitted per period at the steady rate. */
  callsPerPeriod: number;
  /** Period length in milliseconds. */
  periodMs: number;
  /** Bucket capacity as a multiple of callsPerPeriod (>= 1). */
  burstMultiplier: number;
  /** Upper bound on the time one acquire may wait. Unbounded when unset. */
  maxWaitMs?: number;
}

/**
 * Response cache settings.
 */
export interface CacheConfig {
  /** Cache successful GET responses. */
  enabled: boolean;
  /** Default time-to-live in milliseconds. */
  ttlMs: number;
  /** Maximum number of entries. */
  maxSize: number;
  /** Background sweep interval in milliseconds; 0 disables the sweep. */
  cleanupIntervalMs: number;
}

/**
 * Backoff settings for retryable failures.
 */
export interface RetryConfig {
  /** Delay before the first retry in milliseconds. */
  baseDelayMs: number;
  /** Hard cap on any single delay in milliseconds. */
  maxDelayMs: number;
  /** Growth factor per attempt. */
  exponentialBase: number;
  /** Jitter band as a fraction of the delay (0.0 to 1.0). */
  jitterFactor: number;
}

/**
 * Connection pool settings for the lazily created undici pool.
 */
export interface PoolConfig {
  /** Maximum sockets to the origin. */
  connections: number;
  /** Keep-alive timeout for idle sockets in milliseconds. */
  keepAliveTimeoutMs: number;
}

/**
 * Default rate limit configuration.
 */
export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  callsPerPeriod: 100,
  periodMs: 60000,
  burstMultiplier: 1,
};

/**
 * Default cache configuration.
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttlMs: 3600000,
  maxSize: 1000,
  cleanupIntervalMs: 300000,
};

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  exponentialBase: 2,
  jitterFactor: 0.5,
};

/**
 * Default connection pool configuration.
 */
export const DEFAULT_POOL_CONFIG: PoolConfig = {
  connections: 10,
  keepAliveTimeoutMs: 90000,
};

// ============================================================================
// Client Configuration
// ============================================================================

/**
 * Configuration as supplied by callers. Only the base URL is required.
 */
export interface ClientConfigInput {
  /** Base URL every endpoint is resolved against. */
  baseUrl: string;
  /** Bearer credential sent as the Authorization header. */
  credential?: string | SecretString;
  /** Per-attempt timeout in milliseconds. */
  timeoutMs?: number;
  /** Total network attempts per request (not retries after the first). */
  maxRetries?: number;
  /** User-Agent header. */
  userAgent?: string;
  /** Headers sent with every request. */
  defaultHeaders?: Record<string, string>;
  rateLimit?: Partial<RateLimitConfig>;
  cache?: Partial<CacheConfig>;
  retry?: Partial<RetryConfig>;
  pool?: Partial<PoolConfig>;
}

/**
 * Validated configuration with every default applied.
 */
export interface ClientConfig {
  baseUrl: string;
  credential?: SecretString;
  timeoutMs: number;
  maxRetries: number;
  userAgent: string;
  defaultHeaders: Record<string, string>;
  rateLimit: RateLimitConfig;
  cache: CacheConfig;
  retry: RetryConfig;
  pool: PoolConfig;
}

// ============================================================================
// Zod Validation Schemas
// ============================================================================

/**
 * Base URL: http or https, non-empty host, no query or fragment.
 */
export const baseUrlSchema = z
  .string()
  .trim()
  .min(1, 'Base URL cannot be empty')
  .superRefine((value, ctx) => {
    let parsed: URL;
    try {
      parsed = new URL(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid base URL format: ${value}` });
      return;
    }

    if (!ALLOWED_SCHEMES.has(parsed.protocol)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid URL scheme '${parsed.protocol.replace(/:$/, '')}'. Only http/https allowed`,
      });
      return;
    }

    if (parsed.hostname === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Base URL is missing a host: ${value}` });
    }

    if (parsed.search !== '' || parsed.hash !== '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Base URL must not contain a query string or fragment',
      });
    }
  });

export const rateLimitConfigSchema = z.object({
  callsPerPeriod: z.number().positive(),
  periodMs: z.number().positive(),
  burstMultiplier: z.number().min(1),
  maxWaitMs: z.number().positive().optional(),
});

export const cacheConfigSchema = z.object({
  enabled: z.boolean(),
  ttlMs: z.number().positive(),
  maxSize: z.number().int().positive(),
  cleanupIntervalMs: z.number().min(0),
});

export const retryConfigSchema = z.object({
  baseDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
  exponentialBase: z.number().min(1),
  jitterFactor: z.number().min(0).max(1),
});

export const poolConfigSchema = z.object({
  connections: z.number().int().positive(),
  keepAliveTimeoutMs: z.number().int().positive(),
});

const clientConfigSchema = z.object({
  baseUrl: baseUrlSchema,
  timeoutMs: z.number().positive(),
  maxRetries: z.number().int().min(1),
  userAgent: z.string().min(1),
  defaultHeaders: z.record(z.string()),
  rateLimit: rateLimitConfigSchema,
  cache: cacheConfigSchema,
  retry: retryConfigSchema,
  pool: poolConfigSchema,
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Strips trailing slashes so endpoints can be appended with a single '/'.
 */
export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

/**
 * Applies defaults to caller input and validates the result.
 * @throws {ConfigurationError} If any setting is invalid.
 */
export function resolveConfig(input: ClientConfigInput): ClientConfig {
  const candidate = {
    baseUrl: input.baseUrl,
    timeoutMs: input.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxRetries: input.maxRetries ?? DEFAULT_MAX_RETRIES,
    userAgent: input.userAgent ?? DEFAULT_USER_AGENT,
    defaultHeaders: { ...input.defaultHeaders },
    rateLimit: { ...DEFAULT_RATE_LIMIT_CONFIG, ...input.rateLimit },
    cache: { ...DEFAULT_CACHE_CONFIG, ...input.cache },
    retry: { ...DEFAULT_RETRY_CONFIG, ...input.retry },
    pool: { ...DEFAULT_POOL_CONFIG, ...input.pool },
  };

  const result = clientConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error), {
      issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }

  const credential =
    input.credential === undefined || input.credential instanceof SecretString
      ? input.credential
      : new SecretString(input.credential);

  if (credential !== undefined && credential.expose().trim() === '') {
    throw new ConfigurationError('Credential cannot be empty');
  }

  return {
    ...result.data,
    baseUrl: normalizeBaseUrl(result.data.baseUrl),
    credential,
  };
}

// ============================================================================
// Environment Loading
// ============================================================================

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  BASE_URL: z.string().optional(),
  API_KEY: z.string().optional(),
  TIMEOUT_MS: z.coerce.number().positive().optional(),
  MAX_RETRIES: z.coerce.number().int().min(1).optional(),
  RATE_LIMIT_CALLS: z.coerce.number().positive().optional(),
  RATE_LIMIT_PERIOD_MS: z.coerce.number().positive().optional(),
  CACHE_ENABLED: booleanFromEnv.optional(),
  CACHE_TTL_MS: z.coerce.number().positive().optional(),
  CACHE_MAX_SIZE: z.coerce.number().int().positive().optional(),
});

type EnvKey = keyof z.infer<typeof envSchema>;

const ENV_KEYS: EnvKey[] = [
  'BASE_URL',
  'API_KEY',
  'TIMEOUT_MS',
  'MAX_RETRIES',
  'RATE_LIMIT_CALLS',
  'RATE_LIMIT_PERIOD_MS',
  'CACHE_ENABLED',
  'CACHE_TTL_MS',
  'CACHE_MAX_SIZE',
];

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Fluent builder for client configuration.
 */
export class ClientConfigBuilder {
  private config: ClientConfigInput;

  constructor(baseUrl: string = '') {
    this.config = { baseUrl };
  }

  /**
   * Sets the base URL.
   */
  withBaseUrl(url: string): this {
    this.config.baseUrl = url;
    return this;
  }

  /**
   * Sets the bearer credential.
   */
  withCredential(credential: string): this {
    this.config.credential = new SecretString(credential);
    return this;
  }

  /**
   * Sets the per-attempt timeout.
   * @param timeoutMs - Timeout in milliseconds
   */
  withTimeout(timeoutMs: number): this {
    this.config.timeoutMs = timeoutMs;
    return this;
  }

  /**
   * Sets the total number of network attempts per request.
   */
  withMaxRetries(maxRetries: number): this {
    this.config.maxRetries = maxRetries;
    return this;
  }

  withRateLimit(config: Partial<RateLimitConfig>): this {
    this.config.rateLimit = { ...this.config.rateLimit, ...config };
    return this;
  }

  /**
   * Merges cache settings. `enabled` stays as it was unless given.
   */
  withCache(config: Partial<CacheConfig>): this {
    this.config.cache = { ...this.config.cache, ...config };
    return this;
  }

  /**
   * Disables response caching.
   */
  withoutCache(): this {
    this.config.cache = { ...this.config.cache, enabled: false };
    return this;
  }

  withRetry(config: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...config };
    return this;
  }

  withPool(config: Partial<PoolConfig>): this {
    this.config.pool = { ...this.config.pool, ...config };
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Adds a header sent with every request.
   */
  withHeader(name: string, value: string): this {
    this.config.defaultHeaders = { ...this.config.defaultHeaders, [name]: value };
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables (with the default prefix):
   * - API_CLIENT_BASE_URL
   * - API_CLIENT_API_KEY
   * - API_CLIENT_TIMEOUT_MS
   * - API_CLIENT_MAX_RETRIES
   * - API_CLIENT_RATE_LIMIT_CALLS
   * - API_CLIENT_RATE_LIMIT_PERIOD_MS
   * - API_CLIENT_CACHE_ENABLED
   * - API_CLIENT_CACHE_TTL_MS
   * - API_CLIENT_CACHE_MAX_SIZE
   *
   * @throws {ConfigurationError} If a variable cannot be parsed.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    prefix: string = 'API_CLIENT_'
  ): ClientConfigBuilder {
    const raw: Partial<Record<EnvKey, string>> = {};
    for (const key of ENV_KEYS) {
      const value = env[`${prefix}${key}`];
      if (value !== undefined && value.trim() !== '') {
        raw[key] = value.trim();
      }
    }

    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${prefix}${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(message);
    }

    const values = parsed.data;
    const builder = new ClientConfigBuilder(values.BASE_URL ?? '');

    if (values.API_KEY !== undefined) {
      builder.withCredential(values.API_KEY);
    }
    if (values.TIMEOUT_MS !== undefined) {
      builder.withTimeout(values.TIMEOUT_MS);
    }
    if (values.MAX_RETRIES !== undefined) {
      builder.withMaxRetries(values.MAX_RETRIES);
    }
    if (values.RATE_LIMIT_CALLS !== undefined) {
      builder.withRateLimit({ callsPerPeriod: values.RATE_LIMIT_CALLS });
    }
    if (values.RATE_LIMIT_PERIOD_MS !== undefined) {
      builder.withRateLimit({ periodMs: values.RATE_LIMIT_PERIOD_MS });
    }
    if (values.CACHE_ENABLED === false) {
      builder.withoutCache();
    }
    if (values.CACHE_TTL_MS !== undefined) {
      builder.withCache({ ttlMs: values.CACHE_TTL_MS });
    }
    if (values.CACHE_MAX_SIZE !== undefined) {
      builder.withCache({ maxSize: values.CACHE_MAX_SIZE });
    }

    return builder;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): ClientConfig {
    return resolveConfig(this.config);
  }
}
