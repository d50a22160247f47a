/**
 * Canonical request URLs and cache keys.
 *
 * Two calls describing the same query must produce byte-identical URLs no
 * matter the order their parameters were supplied in, so parameters are
 * sorted by name and encoded with URLSearchParams.
 */

import { createHash } from 'node:crypto';

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | null | undefined>;

/**
 * Ensures a leading slash and strips trailing slashes ("/games/" -> "/games").
 */
export function normalizePath(path: string): string {
  const trimmed = path.trim().replace(/\/+$/, '');
  if (!trimmed) {
    return '/';
  }
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Builds the canonical upstream URL. Null and undefined parameters are
 * dropped; everything else is stringified.
 */
export function canonicalizeUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
  const base = baseUrl.replace(/\/+$/, '');
  const search = new URLSearchParams();

  for (const name of Object.keys(params).sort()) {
    const value = params[name];
    if (value === undefined || value === null) {
      continue;
    }
    search.append(name, String(value));
  }

  const query = search.toString();
  const url = `${base}${normalizePath(path)}`;
  return query ? `${url}?${query}` : url;
}

/**
 * SHA-256 hex digest of the canonical URL.
 */
export function cacheKeyFor(canonicalUrl: string): string {
  return createHash('sha256').update(canonicalUrl, 'utf8').digest('hex');
}
