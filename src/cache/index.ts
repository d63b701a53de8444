/**
 * TTL + LRU response cache.
 *
 * Entries live in a `Map`, whose insertion order doubles as recency order:
 * touching an entry deletes and re-inserts it, so the first key is always
 * the least recently used. Every operation is synchronous.
 *
 * @example
 * ```typescript
 * const cache = new ResponseCache({ defaultTtlMs: 60_000, maxSize: 100 });
 * const key = cache.generateKey('/places/near', { lat: 35.0, lng: 139.0 });
 *
 * const hit = cache.get(key);
 * if (hit === CACHE_MISS) {
 *   cache.set(key, await fetchPlaces());
 * }
 * ```
 */

import { createHash } from 'node:crypto';
import { cacheConfigSchema } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { JsonValue } from '../types/index.js';

/**
 * Returned by `get` when there is no live entry. `null` is a cacheable value.
 */
export const CACHE_MISS: unique symbol = Symbol('CACHE_MISS');

/** Default TTL (1 hour). */
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

/** Default maximum number of entries. */
export const DEFAULT_CACHE_MAX_SIZE = 1000;

/** Default sweep interval (5 minutes). */
export const DEFAULT_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

/** Hex characters of the digest kept in a key. */
const KEY_HASH_LENGTH = 16;

/**
 * Parameters folded into a cache key. Top-level `null` and `undefined`
 * values are ignored, as they are left out of a query string.
 */
export type CacheKeyParams = Record<string, JsonValue | undefined>;

const cacheOptionsSchema = cacheConfigSchema.omit({ enabled: true });

interface CacheEntry<T> {
  readonly value: T;
  readonly expiresAt: number;
}

export interface ResponseCacheOptions {
  defaultTtlMs?: number;
  maxSize?: number;
  /** 0 disables the background sweep. */
  cleanupIntervalMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  maxSize: number;
  /** hits / (hits + misses), 0 before any lookup */
  hitRate: number;
  totalRequests: number;
  evictions: number;
}

export interface CachedOptions<A extends JsonValue[]> {
  /** TTL for results of the wrapped function */
  ttlMs?: number;
  /** Derives the key params from the call arguments */
  key?: (...args: A) => CacheKeyParams;
}

/**
 * Serializes a value with object keys sorted at every depth.
 */
export function stableStringify(value: JsonValue | CacheKeyParams | undefined): string {
  if (value === undefined) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    return stringifyObject(value);
  }
  return JSON.stringify(value);
}

function stringifyObject(obj: CacheKeyParams): string {
  const parts = Object.keys(obj)
    .sort()
    .flatMap((key) => {
      const item = obj[key];
      return item === undefined ? [] : [`${JSON.stringify(key)}:${stableStringify(item)}`];
    });
  return `{${parts.join(',')}}`;
}

/**
 * Builds `<last path segment>_<16 hex chars of sha256>` for an endpoint and
 * its params. The key does not depend on param order.
 */
export function generateCacheKey(endpoint: string, params?: CacheKeyParams): string {
  const present = Object.entries(params ?? {}).filter(
    (entry): entry is [string, JsonValue] => entry[1] !== undefined && entry[1] !== null
  );
  const material = present.length > 0 ? `${endpoint}|${stringifyObject(Object.fromEntries(present))}` : endpoint;
  const digest = createHash('sha256').update(material).digest('hex').slice(0, KEY_HASH_LENGTH);

  const segments = endpoint.split('/').filter((segment) => segment !== '');
  const prefix = segments.length > 0 ? segments[segments.length - 1] : 'root';
  return `${prefix}_${digest}`;
}

/**
 * In-memory cache with per-entry TTL and least-recently-used eviction.
 */
export class ResponseCache<T = JsonValue> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly defaultTtlMs: number;
  private readonly maxSize: number;
  private readonly logger: Logger;
  private cleanupTimer?: ReturnType<typeof setInterval>;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @throws {ConfigurationError} If `maxSize` is below 1, the TTL is not
   * positive, or the sweep interval is negative.
   */
  constructor(options: ResponseCacheOptions = {}, logger: Logger = new NoopLogger()) {
    const parsed = cacheOptionsSchema.safeParse({
      ttlMs: options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS,
      maxSize: options.maxSize ?? DEFAULT_CACHE_MAX_SIZE,
      cleanupIntervalMs: options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS,
    });
    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.issues.map((issue) => `cache.${issue.path.join('.')}: ${issue.message}`).join('; ')
      );
    }

    this.defaultTtlMs = parsed.data.ttlMs;
    this.maxSize = parsed.data.maxSize;
    this.logger = logger;

    const { cleanupIntervalMs } = parsed.data;
    if (cleanupIntervalMs > 0) {
      this.cleanupTimer = setInterval(() => this.sweep(), cleanupIntervalMs);
      this.cleanupTimer.unref();
    }
  }

  /**
   * Returns the live value for `key` and marks it most recently used.
   */
  get(key: string): T | typeof CACHE_MISS {
    const entry = this.entries.get(key);

    if (entry === undefined) {
      this.misses++;
      this.logger.debug('Cache miss', { key });
      return CACHE_MISS;
    }

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      this.logger.debug('Cache entry expired', { key });
      return CACHE_MISS;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    this.logger.debug('Cache hit', { key });
    return entry.value;
  }

  /**
   * Stores `value`, evicting the least recently used entry if a new key
   * would exceed `maxSize`.
   *
   * @throws {ConfigurationError} If `ttlMs` is not positive.
   */
  set(key: string, value: T, ttlMs?: number): void {
    if (ttlMs !== undefined && !(ttlMs > 0)) {
      throw new ConfigurationError(`cache.ttlMs: TTL must be positive, got ${ttlMs}`);
    }
    const existed = this.entries.delete(key);

    if (!existed && this.entries.size >= this.maxSize) {
      this.evictOldest();
    }

    this.entries.set(key, { value, expiresAt: Date.now() + (ttlMs ?? this.defaultTtlMs) });
    this.logger.debug('Cache set', { key, ttlMs: ttlMs ?? this.defaultTtlMs });
  }

  /**
   * Whether a live entry exists. Does not affect recency or stats.
   */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return false;
    }
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Removes every entry and resets hit/miss counters.
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /**
   * Removes expired entries.
   * @returns Number of entries removed
   */
  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug('Removed expired cache entries', { removed });
    }
    return removed;
  }

  generateKey(endpoint: string, params?: CacheKeyParams): string {
    return generateCacheKey(endpoint, params);
  }

  getStats(): CacheStats {
    const totalRequests = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      maxSize: this.maxSize,
      hitRate: totalRequests > 0 ? this.hits / totalRequests : 0,
      totalRequests,
      evictions: this.evictions,
    };
  }

  /**
   * Wraps an async function so results are cached per argument list.
   * Rejections are not cached.
   */
  cached<A extends JsonValue[]>(
    namespace: string,
    fn: (...args: A) => Promise<T>,
    options: CachedOptions<A> = {}
  ): (...args: A) => Promise<T> {
    return async (...args: A): Promise<T> => {
      const params = options.key ? options.key(...args) : { args };
      const key = this.generateKey(namespace, params);

      const hit = this.get(key);
      if (hit !== CACHE_MISS) {
        return hit;
      }

      const result = await fn(...args);
      this.set(key, result, options.ttlMs);
      return result;
    };
  }

  /**
   * Stops the background sweep and drops expired entries once more.
   */
  dispose(): void {
    if (this.cleanupTimer !== undefined) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.cleanupExpired();
  }

  private sweep(): void {
    try {
      this.cleanupExpired();
    } catch (error) {
      this.logger.error('Cache cleanup failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) {
      return;
    }
    this.entries.delete(oldest.value);
    this.evictions++;
    this.logger.debug('Evicted least recently used cache entry', { key: oldest.value });
  }
}
