/**
 * In-process LRU response cache.
 *
 * Used when no shared cache backend is configured. Entries are evicted
 * after their TTL or when the cache reaches max size.
 */

import { LRUCache } from 'lru-cache';
import { logger } from '../../lib/logger.js';
import type { CacheBackend, CacheProvider } from './types.js';

export interface MemoryCacheOptions {
  /** Maximum number of cached responses (default: 500) */
  maxEntries?: number;
  /** Lifetime applied when set() is given no positive TTL, in seconds (default: 3600) */
  defaultTtlSeconds?: number;
}

export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';
  private readonly cache: LRUCache<string, string>;

  constructor(options: MemoryCacheOptions = {}) {
    this.cache = new LRUCache<string, string>({
      max: options.maxEntries ?? 500,
      ttl: (options.defaultTtlSeconds ?? 3600) * 1000,
    });
  }

  async get(key: string): Promise<string | null> {
    return this.cache.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.cache.set(key, value, ttlSeconds > 0 ? { ttl: ttlSeconds * 1000 } : undefined);
  }

  /** Number of currently cached responses */
  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}

/**
 * Provider around a single always-available memory backend.
 */
export class MemoryCacheProvider implements CacheProvider {
  readonly backend: MemoryCacheBackend;

  constructor(options: MemoryCacheOptions = {}) {
    this.backend = new MemoryCacheBackend(options);
    logger.info('Using in-process response cache', {
      maxEntries: options.maxEntries ?? 500,
    });
  }

  async acquire(): Promise<CacheBackend | null> {
    return this.backend;
  }

  async close(): Promise<void> {
    this.backend.clear();
  }
}
