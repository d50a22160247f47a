/**
 * College Football Data API client with a cache-aside layer.
 *
 * Every call is canonicalized to a URL, hashed, and looked up in the
 * response cache before going upstream. The cache is optional: when the
 * provider reports it unavailable, or a cache operation fails, the call
 * proceeds as a miss.
 *
 * Concurrent misses for the same canonical URL share one upstream request.
 */

import { logger, errorMessage } from '../../lib/logger.js';
import { CfbdApiError, CfbdNetworkError } from '../../lib/errors.js';
import type { CacheBackend, CacheProvider } from '../cache/index.js';
import { EndpointTtlPolicy } from './ttl-policy.js';
import { canonicalizeUrl, cacheKeyFor, normalizePath, type QueryParams } from './url.js';

/**
 * The upstream API is read-only.
 */
export type HttpMethod = 'GET';

export interface CfbdClientConfig {
  apiKey: string;
  /** Defaults to https://apinext.collegefootballdata.com */
  baseUrl?: string;
  /** Upstream request ceiling in milliseconds (default 30000) */
  timeoutMs?: number;
  cache: CacheProvider;
  ttlPolicy?: EndpointTtlPolicy;
}

export interface CfbdClientStats {
  hits: number;
  misses: number;
  upstreamRequests: number;
}

type CacheLookup = { hit: true; data: unknown } | { hit: false };

const DEFAULT_BASE_URL = 'https://apinext.collegefootballdata.com';
const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_TTL_SECONDS = 3600;

export class CfbdClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly cache: CacheProvider;
  private readonly ttlPolicy: EndpointTtlPolicy;
  private readonly inFlight = new Map<string, Promise<unknown>>();
  private readonly counters: CfbdClientStats = { hits: 0, misses: 0, upstreamRequests: 0 };

  constructor(config: CfbdClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cache = config.cache;
    this.ttlPolicy = config.ttlPolicy ?? new EndpointTtlPolicy(DEFAULT_TTL_SECONDS);
  }

  get stats(): CfbdClientStats {
    return { ...this.counters };
  }

  /**
   * Returns the parsed JSON body for `path` with `params`, from the cache
   * when a fresh entry exists.
   *
   * @throws CfbdApiError on a non-2xx upstream response
   * @throws CfbdNetworkError when no response arrives (DNS, connection, timeout)
   */
  async fetch(method: HttpMethod, path: string, params: QueryParams = {}): Promise<unknown> {
    const endpoint = normalizePath(path);
    const url = canonicalizeUrl(this.baseUrl, endpoint, params);
    const key = cacheKeyFor(url);

    const cache = await this.cache.acquire();
    const cached = cache ? await this.lookup(cache, key) : { hit: false as const };
    if (cached.hit) {
      this.counters.hits++;
      logger.debug('Cache hit', { endpoint, key: key.slice(0, 12) });
      return cached.data;
    }
    this.counters.misses++;

    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug('Joining in-flight upstream request', { endpoint });
      return pending;
    }

    const request = this.load(method, endpoint, url, key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  private async lookup(cache: CacheBackend, key: string): Promise<CacheLookup> {
    let stored: string | null;
    try {
      stored = await cache.get(key);
    } catch (error) {
      logger.warn('Cache lookup failed, treating as miss', {
        backend: cache.name,
        error: errorMessage(error),
      });
      return { hit: false };
    }

    if (stored === null) {
      return { hit: false };
    }

    try {
      return { hit: true, data: JSON.parse(stored) };
    } catch (error) {
      logger.warn('Discarding unparseable cache entry', {
        key: key.slice(0, 12),
        error: errorMessage(error),
      });
      return { hit: false };
    }
  }

  private async load(method: HttpMethod, endpoint: string, url: string, key: string): Promise<unknown> {
    const body = await this.request(method, url);

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      logger.error('CFBD API returned a non-JSON body', { url, error: errorMessage(error) });
      throw new Error(`CFBD API returned a response that is not valid JSON for url '${url}'`);
    }

    await this.store(key, body, this.ttlPolicy.ttlFor(endpoint));
    return data;
  }

  private async request(method: HttpMethod, url: string): Promise<string> {
    this.counters.upstreamRequests++;
    const startTime = Date.now();
    logger.debug('CFBD API request', { method, url });

    let response: Response;
    let body: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      const message = describeFetchFailure(error, this.timeoutMs);
      logger.error('CFBD API request failed', { url, error: message });
      throw new CfbdNetworkError(message, url);
    }

    const duration = Date.now() - startTime;
    if (!response.ok) {
      logger.error('CFBD API error', { url, status: response.status, duration });
      throw new CfbdApiError({
        status: response.status,
        statusText: response.statusText,
        url,
        body,
      });
    }

    logger.debug('CFBD API response', { url, status: response.status, duration });
    return body;
  }

  private async store(key: string, body: string, ttlSeconds: number): Promise<void> {
    const cache = await this.cache.acquire();
    if (!cache) {
      return;
    }
    try {
      await cache.set(key, body, ttlSeconds);
    } catch (error) {
      logger.warn('Cache store failed', { backend: cache.name, error: errorMessage(error) });
    }
  }
}

/**
 * Turns a fetch rejection into a one-line message. Node reports connection
 * failures as "fetch failed" with the socket error on `cause`.
 */
function describeFetchFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return `Request timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
}
