/**
 * Resilience primitives: rate limiting, retry with backoff, and locking.
 */

export { Mutex } from './mutex.js';
export {
  RateLimiter,
  createRateLimiter,
  type RateLimiterOptions,
  type RateLimiterStats,
} from './rate-limiter.js';
export {
  RetryExecutor,
  computeBackoffDelay,
  computeRetryDelay,
  type RetryExecutorOptions,
  type RetryHooks,
} from './retry.js';
export { sleep } from './sleep.js';
