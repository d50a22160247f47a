/**
 * College Football Data API client module.
 *
 * Usage:
 *   const cache = createCacheProvider({ ... });
 *   const client = createCfbdClient(getEnv(), cache);
 *   const games = await client.fetch('GET', '/games', { year: 2023, week: 1 });
 */

import type { Env } from '../../lib/env.js';
import type { CacheProvider } from '../cache/index.js';
import { CfbdClient } from './client.js';
import { EndpointTtlPolicy } from './ttl-policy.js';

export { CfbdClient } from './client.js';
export type { CfbdClientConfig, CfbdClientStats, HttpMethod } from './client.js';
export { EndpointTtlPolicy, ENDPOINT_TTL_SECONDS } from './ttl-policy.js';
export {
  canonicalizeUrl,
  cacheKeyFor,
  normalizePath,
  type QueryParams,
  type QueryValue,
} from './url.js';

export function createCfbdClient(
  env: Pick<Env, 'CFBD_API_KEY' | 'CFBD_API_BASE_URL' | 'UPSTREAM_TIMEOUT_MS' | 'CACHE_DEFAULT_TTL_SECONDS'>,
  cache: CacheProvider
): CfbdClient {
  return new CfbdClient({
    apiKey: env.CFBD_API_KEY,
    baseUrl: env.CFBD_API_BASE_URL,
    timeoutMs: env.UPSTREAM_TIMEOUT_MS,
    cache,
    ttlPolicy: new EndpointTtlPolicy(env.CACHE_DEFAULT_TTL_SECONDS),
  });
}
