/**
 * Cache lifetimes per upstream endpoint, in seconds.
 *
 * Game-level data changes while games are being played, so it gets a short
 * lifetime. Rankings and pregame win probabilities move at most a few times
 * a week.
 */

import { normalizePath } from './url.js';

export const ENDPOINT_TTL_SECONDS: Readonly<Record<string, number>> = {
  '/games': 900,
  '/games/teams': 900,
  '/plays': 900,
  '/drives': 900,
  '/play/stats': 900,
  '/game/box/advanced': 900,
  '/records': 3600,
  '/rankings': 21600,
  '/metrics/wp/pregame': 21600,
};

export class EndpointTtlPolicy {
  constructor(
    private readonly defaultTtlSeconds: number,
    private readonly table: Readonly<Record<string, number>> = ENDPOINT_TTL_SECONDS,
  ) {}

  ttlFor(path: string): number {
    const normalized = normalizePath(path);
    return Object.hasOwn(this.table, normalized) ? this.table[normalized] : this.defaultTtlSeconds;
  }
}
