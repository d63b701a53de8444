/**
 * Token bucket rate limiter.
 */

import { rateLimitConfigSchema, type RateLimitConfig } from '../config/index.js';
import { ConfigurationError, RateLimitTimeoutError, RequestCancelledError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { sleep } from './sleep.js';

/**
 * Rate limiter options. `burstMultiplier` defaults to 1.
 */
export type RateLimiterOptions = Omit<RateLimitConfig, 'burstMultiplier'> & {
  burstMultiplier?: number;
};

/**
 * Rate limiter statistics.
 */
export interface RateLimiterStats {
  tokens: number;
  maxTokens: number;
  refillRatePerSecond: number;
  totalAcquired: number;
  totalWaitMs: number;
}

/**
 * Token bucket admitting `callsPerPeriod` calls per `periodMs` on average,
 * with bursts up to `callsPerPeriod * burstMultiplier`.
 *
 * Refill, check and deduct happen synchronously, so concurrent callers on
 * the event loop never overdraw the bucket.
 */
export class RateLimiter {
  private readonly maxTokens: number;
  private readonly refillRatePerMs: number;
  private readonly maxWaitMs?: number;
  private readonly logger: Logger;
  private tokens: number;
  private lastRefill: number;
  private totalAcquired = 0;
  private totalWaitMs = 0;

  constructor(options: RateLimiterOptions, logger: Logger = new NoopLogger()) {
    const parsed = rateLimitConfigSchema.safeParse({
      ...options,
      burstMultiplier: options.burstMultiplier ?? 1,
    });
    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.issues.map((issue) => `rateLimit.${issue.path.join('.')}: ${issue.message}`).join('; ')
      );
    }

    const config = parsed.data;
    this.maxTokens = config.callsPerPeriod * config.burstMultiplier;
    this.refillRatePerMs = config.callsPerPeriod / config.periodMs;
    this.maxWaitMs = config.maxWaitMs;
    this.logger = logger;
    this.tokens = this.maxTokens;
    this.lastRefill = Date.now();
  }

  /**
   * Waits until `tokens` are available, then takes them.
   *
   * @throws {RequestCancelledError} If `signal` aborts while waiting. No token is taken.
   * @throws {RateLimitTimeoutError} If `maxWaitMs` is set and would be exceeded.
   * @throws {ConfigurationError} If `tokens` exceeds the bucket capacity.
   */
  async acquire(tokens = 1, signal?: AbortSignal): Promise<true> {
    this.assertSatisfiable(tokens);
    let waitedMs = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new RequestCancelledError(signal.reason);
      }

      if (this.tryAcquire(tokens)) {
        return true;
      }

      const waitMs = this.getWaitTime(tokens);
      if (this.maxWaitMs !== undefined && waitedMs + waitMs > this.maxWaitMs) {
        throw new RateLimitTimeoutError(waitedMs + waitMs, this.maxWaitMs);
      }

      this.logger.debug('Rate limit reached, waiting for tokens', {
        waitMs,
        requested: tokens,
        available: this.tokens,
      });

      waitedMs += waitMs;
      this.totalWaitMs += waitMs;
      await sleep(waitMs, signal);
    }
  }

  /**
   * Takes `tokens` if they are available right now.
   */
  tryAcquire(tokens = 1): boolean {
    this.refill();

    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      this.totalAcquired += tokens;
      return true;
    }

    return false;
  }

  /**
   * Milliseconds until `tokens` would be available; 0 if they are now.
   */
  getWaitTime(tokens = 1): number {
    this.refill();

    if (this.tokens >= tokens) {
      return 0;
    }

    const needed = tokens - this.tokens;
    return Math.max(1, Math.ceil(needed / this.refillRatePerMs));
  }

  /**
   * Gets the current number of tokens.
   */
  getTokens(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Refills the bucket.
   */
  reset(): void {
    this.tokens = this.maxTokens;
    this.lastRefill = Date.now();
  }

  getStats(): RateLimiterStats {
    return {
      tokens: this.getTokens(),
      maxTokens: this.maxTokens,
      refillRatePerSecond: this.refillRatePerMs * 1000,
      totalAcquired: this.totalAcquired,
      totalWaitMs: this.totalWaitMs,
    };
  }

  private assertSatisfiable(tokens: number): void {
    if (!(tokens > 0) || tokens > this.maxTokens) {
      throw new ConfigurationError(
        `Cannot acquire ${tokens} tokens from a bucket of ${this.maxTokens}`
      );
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRatePerMs);
    this.lastRefill = now;
  }
}

/**
 * Creates a rate limiter with the given configuration.
 */
export function createRateLimiter(options: RateLimiterOptions, logger?: Logger): RateLimiter {
  return new RateLimiter(options, logger);
}
