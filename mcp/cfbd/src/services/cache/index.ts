/**
 * Response cache module.
 *
 * Usage:
 *   const provider = createCacheProvider({ redisUrl: env.REDIS_URL, ... });
 *   const cache = await provider.acquire(); // null while unavailable
 */

import { MemoryCacheProvider } from './memory.js';
import { RedisCacheProvider } from './redis.js';
import type { CacheProvider } from './types.js';

export * from './types.js';
export { MemoryCacheBackend, MemoryCacheProvider, type MemoryCacheOptions } from './memory.js';
export {
  RedisCacheProvider,
  createRedisConnection,
  type RedisCacheOptions,
  type RedisConnection,
  type RedisConnectionFactory,
} from './redis.js';

export interface CacheConfig {
  /** Shared Redis backend; the in-process cache is used when absent */
  redisUrl?: string;
  timeoutMs: number;
  retryIntervalMs: number;
  defaultTtlSeconds: number;
}

export function createCacheProvider(config: CacheConfig): CacheProvider {
  if (config.redisUrl) {
    return new RedisCacheProvider({
      url: config.redisUrl,
      timeoutMs: config.timeoutMs,
      retryIntervalMs: config.retryIntervalMs,
    });
  }
  return new MemoryCacheProvider({ defaultTtlSeconds: config.defaultTtlSeconds });
}
