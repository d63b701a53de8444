/**
 * Retry executor with exponential backoff.
 */

import type { RetryConfig } from '../config/index.js';
import { RateLimitedError, isResilientClientError, isRetryableError } from '../errors/index.js';
import { sleep } from './sleep.js';

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called before each backoff sleep. `attempt` is the 1-based attempt that failed. */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when the last attempt fails with a retryable error */
  onExhausted?: (error: Error, attempts: number) => void;
}

/**
 * Backoff delay before retrying after the 0-based `attempt` failed.
 *
 * The exponential delay is capped at `maxDelayMs`, spread uniformly within
 * `±jitterFactor` of itself, then clamped to `[0, maxDelayMs]`.
 */
export function computeBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.exponentialBase, attempt);
  const cappedDelay = Math.min(config.maxDelayMs, exponentialDelay);
  const jitter = cappedDelay * config.jitterFactor * (2 * random() - 1);
  return clampDelay(cappedDelay + jitter, config.maxDelayMs);
}

/**
 * Backoff delay for a specific failure. A server-provided Retry-After on a
 * 429 raises the delay, never above `maxDelayMs`.
 */
export function computeRetryDelay(
  error: unknown,
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const delay = computeBackoffDelay(attempt, config, random);
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return clampDelay(Math.max(delay, error.retryAfterMs), config.maxDelayMs);
  }
  return delay;
}

function clampDelay(delay: number, maxDelayMs: number): number {
  return Math.max(0, Math.min(maxDelayMs, delay));
}

/**
 * Options for a retry executor.
 */
export interface RetryExecutorOptions extends RetryConfig {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Source of randomness for jitter. */
  random?: () => number;
}

/**
 * Runs an operation until it succeeds, fails with a non-retryable error,
 * or runs out of attempts.
 */
export class RetryExecutor {
  private readonly options: RetryExecutorOptions;
  private readonly hooks: RetryHooks;

  constructor(options: RetryExecutorOptions, hooks: RetryHooks = {}) {
    this.options = options;
    this.hooks = hooks;
  }

  /**
   * Executes an operation with retry logic.
   * @param operation - Receives the 0-based attempt number
   * @param signal - Aborts the backoff sleep
   * @throws The last error, with `attempts` and `elapsedMs` attached when it is a client error
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const startTime = Date.now();
    let attempt = 0;

    for (;;) {
      try {
        return await operation(attempt);
      } catch (error) {
        const attemptsMade = attempt + 1;

        if (!isRetryableError(error)) {
          throw annotate(error, attemptsMade, startTime);
        }

        if (attemptsMade >= this.options.maxAttempts) {
          this.hooks.onExhausted?.(toError(error), attemptsMade);
          throw annotate(error, attemptsMade, startTime);
        }

        const delayMs = computeRetryDelay(error, attempt, this.options, this.options.random);
        this.hooks.onRetry?.(attemptsMade, toError(error), delayMs);

        try {
          await sleep(delayMs, signal);
        } catch (cancelled) {
          throw annotate(cancelled, attemptsMade, startTime);
        }
        attempt++;
      }
    }
  }
}

function annotate(error: unknown, attempts: number, startTime: number): unknown {
  if (isResilientClientError(error)) {
    return error.withAttempts(attempts, Date.now() - startTime);
  }
  return error;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
