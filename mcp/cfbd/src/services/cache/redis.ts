/**
 * Redis-backed response cache.
 *
 * The connection is opened lazily on first use and shared by every request.
 * When Redis cannot be reached the provider reports "unavailable" (null)
 * and does not try to connect again until the retry interval has passed,
 * so a dead cache costs at most one connect timeout per interval.
 */

import { createClient } from 'redis';
import { logger, errorMessage } from '../../lib/logger.js';
import { withTimeout, type CacheBackend, type CacheProvider } from './types.js';

/**
 * The slice of a Redis client the cache uses.
 */
export interface RedisConnection {
  readonly isReady: boolean;
  connect(): Promise<void>;
  get(key: string): Promise<string | null>;
  setEx(key: string, value: string, ttlSeconds: number): Promise<void>;
  disconnect(): Promise<void>;
  onError(listener: (error: Error) => void): void;
}

export type RedisConnectionFactory = (url: string, connectTimeoutMs: number) => RedisConnection;

/**
 * Builds a node-redis client that fails fast instead of reconnecting in the
 * background; reconnection is driven by RedisCacheProvider.acquire().
 */
export const createRedisConnection: RedisConnectionFactory = (url, connectTimeoutMs) => {
  const client = createClient({
    url,
    socket: {
      connectTimeout: connectTimeoutMs,
      reconnectStrategy: false,
    },
  });

  return {
    get isReady() {
      return client.isReady;
    },
    async connect() {
      await client.connect();
    },
    async get(key) {
      const value = await client.get(key);
      return typeof value === 'string' ? value : null;
    },
    async setEx(key, value, ttlSeconds) {
      await client.set(key, value, { EX: ttlSeconds });
    },
    async disconnect() {
      if (client.isOpen) {
        await client.disconnect();
      }
    },
    onError(listener) {
      client.on('error', listener);
    },
  };
};

export interface RedisCacheOptions {
  url: string;
  /** Budget for connecting and for each get/set, in milliseconds */
  timeoutMs: number;
  /** Minimum wait between failed connection attempts, in milliseconds */
  retryIntervalMs: number;
  factory?: RedisConnectionFactory;
  now?: () => number;
}

class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';

  constructor(
    private readonly connection: RedisConnection,
    private readonly timeoutMs: number,
  ) {}

  get(key: string): Promise<string | null> {
    return withTimeout(this.connection.get(key), this.timeoutMs, 'get');
  }

  set(key: string, value: string, ttlSeconds: number): Promise<void> {
    return withTimeout(this.connection.setEx(key, value, ttlSeconds), this.timeoutMs, 'set');
  }
}

export class RedisCacheProvider implements CacheProvider {
  private readonly factory: RedisConnectionFactory;
  private readonly now: () => number;
  private connection: RedisConnection | null = null;
  private backend: RedisCacheBackend | null = null;
  private connecting: Promise<RedisCacheBackend | null> | null = null;
  private lastFailureAt: number | null = null;

  constructor(private readonly options: RedisCacheOptions) {
    this.factory = options.factory ?? createRedisConnection;
    this.now = options.now ?? Date.now;
  }

  async acquire(): Promise<CacheBackend | null> {
    if (this.connection?.isReady && this.backend) {
      return this.backend;
    }
    if (this.connecting) {
      return this.connecting;
    }
    if (
      this.lastFailureAt !== null &&
      this.now() - this.lastFailureAt < this.options.retryIntervalMs
    ) {
      return null;
    }

    this.connecting = this.connect().finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  private async connect(): Promise<RedisCacheBackend | null> {
    await this.discard();

    let connection: RedisConnection | null = null;
    try {
      connection = this.factory(this.options.url, this.options.timeoutMs);
      connection.onError((error) => {
        logger.warn('Redis connection error', { error: error.message });
      });
      await withTimeout(connection.connect(), this.options.timeoutMs, 'connect');
    } catch (error) {
      this.lastFailureAt = this.now();
      logger.warn('Redis unavailable, continuing without shared cache', {
        error: errorMessage(error),
        retryInMs: this.options.retryIntervalMs,
      });
      await connection?.disconnect().catch((disconnectError: unknown) => {
        logger.debug('Redis disconnect after failed connect errored', {
          error: errorMessage(disconnectError),
        });
      });
      return null;
    }

    this.lastFailureAt = null;
    this.connection = connection;
    this.backend = new RedisCacheBackend(connection, this.options.timeoutMs);
    logger.info('Redis cache connected');
    return this.backend;
  }

  private async discard(): Promise<void> {
    const stale = this.connection;
    this.connection = null;
    this.backend = null;
    if (stale) {
      await stale.disconnect().catch((error: unknown) => {
        logger.debug('Failed to close stale Redis connection', { error: errorMessage(error) });
      });
    }
  }

  async close(): Promise<void> {
    await this.discard();
  }
}
