/**
 * Lazy, single-initializer management of the client's undici dispatcher.
 *
 * @module transport/connection
 */

import { Pool, type Dispatcher } from 'undici';
import type { PoolConfig } from '../config/index.js';
import { ClientClosedError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { Mutex } from '../resilience/mutex.js';

/**
 * Lifecycle of a managed connection.
 */
export type ConnectionState = 'unset' | 'initializing' | 'ready' | 'closed';

/**
 * Creates the dispatcher for an origin. May be async.
 */
export type ConnectionFactory = (origin: string, pool: PoolConfig) => Dispatcher | Promise<Dispatcher>;

/**
 * Connection statistics.
 */
export interface ConnectionStats {
  state: ConnectionState;
  /** Whether `close()` will close the dispatcher */
  owned: boolean;
  /** Times the factory produced a dispatcher */
  initializations: number;
  /** Calls to `acquire()` that returned a dispatcher */
  requests: number;
}

export interface ConnectionManagerOptions {
  /** Origin (scheme + host + port) the dispatcher serves */
  origin: string;
  pool: PoolConfig;
  /** Caller-owned dispatcher, used as-is and never closed */
  connection?: Dispatcher;
  factory?: ConnectionFactory;
  logger?: Logger;
}

/**
 * Default factory: an undici pool for the origin.
 */
export const createPoolConnection: ConnectionFactory = (origin, pool) =>
  new Pool(origin, {
    connections: pool.connections,
    pipelining: 1,
    keepAliveTimeout: pool.keepAliveTimeoutMs,
  });

/**
 * Hands out the dispatcher, creating it on first use.
 *
 * Once ready, `acquire()` returns without locking. Before that, callers
 * queue on a mutex and only the first runs the factory; the rest re-check
 * the state and reuse its result.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager({ origin: 'https://api.example.com', pool });
 * const dispatcher = await manager.acquire();
 * // ...
 * await manager.close();
 * ```
 */
export class ConnectionManager {
  private readonly origin: string;
  private readonly pool: PoolConfig;
  private readonly factory: ConnectionFactory;
  private readonly owned: boolean;
  private readonly logger: Logger;
  private readonly mutex = new Mutex();
  private dispatcher?: Dispatcher;
  private state: ConnectionState = 'unset';
  private initializations = 0;
  private requests = 0;

  constructor(options: ConnectionManagerOptions) {
    this.origin = options.origin;
    this.pool = options.pool;
    this.factory = options.factory ?? createPoolConnection;
    this.logger = options.logger ?? new NoopLogger();

    if (options.connection !== undefined) {
      this.dispatcher = options.connection;
      this.state = 'ready';
      this.owned = false;
    } else {
      this.owned = true;
    }
  }

  /**
   * Returns the ready dispatcher, initializing it if needed.
   * @throws {ClientClosedError} After `close()`.
   */
  async acquire(): Promise<Dispatcher> {
    const ready = this.readyDispatcher();
    if (ready !== undefined) {
      this.requests++;
      return ready;
    }

    return this.mutex.runExclusive(async () => {
      const existing = this.readyDispatcher();
      if (existing !== undefined) {
        this.requests++;
        return existing;
      }

      this.state = 'initializing';
      let created: Dispatcher;
      try {
        created = await this.factory(this.origin, this.pool);
      } catch (error) {
        if (!this.isClosed()) {
          this.state = 'unset';
        }
        throw error;
      }

      if (this.isClosed()) {
        await created.close();
        throw new ClientClosedError();
      }

      this.dispatcher = created;
      this.state = 'ready';
      this.initializations++;
      this.requests++;
      this.logger.debug('Connection created', { origin: this.origin });
      return created;
    });
  }

  /**
   * Closes the dispatcher if this manager created it. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.isClosed()) {
      return;
    }

    const dispatcher = this.dispatcher;
    this.state = 'closed';
    this.dispatcher = undefined;

    if (dispatcher !== undefined && this.owned) {
      await dispatcher.close();
      this.logger.info('Connection closed', { origin: this.origin });
    }
  }

  getState(): ConnectionState {
    return this.state;
  }

  isClosed(): boolean {
    return this.state === 'closed';
  }

  getStats(): ConnectionStats {
    return {
      state: this.state,
      owned: this.owned,
      initializations: this.initializations,
      requests: this.requests,
    };
  }

  private readyDispatcher(): Dispatcher | undefined {
    if (this.isClosed()) {
      throw new ClientClosedError();
    }
    return this.state === 'ready' ? this.dispatcher : undefined;
  }
}
