/**
 * In-memory store for pending authorization grants.
 *
 * Codes only live for the length of one authorize -> token round trip, so
 * they are kept in memory like the short-lived state in the OAuth provider.
 * A grant is handed out at most once: take() removes it.
 */

import { randomBytes } from 'node:crypto';
import { logger, redact } from '../lib/logger.js';

export interface AuthorizationGrant {
  code: string;
  clientId: string;
  redirectUri: string;
  codeChallenge: string;
  scope?: string;
  createdAt: number;
}

export type NewAuthorizationGrant = Omit<AuthorizationGrant, 'code' | 'createdAt'>;

export interface AuthorizationCodeStoreOptions {
  /** Lifetime of an unexchanged code in seconds; 0 disables expiry (default: 600) */
  ttlSeconds?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export class AuthorizationCodeStore {
  private readonly grants = new Map<string, AuthorizationGrant>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: AuthorizationCodeStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? 600) * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Stores a grant under a fresh one-time code and returns the code.
   */
  create(grant: NewAuthorizationGrant): string {
    this.sweep();

    const code = randomBytes(16).toString('hex');
    this.grants.set(code, { ...grant, code, createdAt: this.now() });

    logger.debug('Authorization code issued', {
      code: redact(code),
      clientId: grant.clientId,
    });
    return code;
  }

  /**
   * Removes and returns the grant for a code. Unknown, expired and
   * already-taken codes all yield undefined.
   */
  take(code: string): AuthorizationGrant | undefined {
    const grant = this.grants.get(code);
    if (!grant) {
      return undefined;
    }

    this.grants.delete(code);

    if (this.isExpired(grant)) {
      logger.info('Authorization code expired before exchange', {
        code: redact(code),
        clientId: grant.clientId,
      });
      return undefined;
    }

    return grant;
  }

  /** Number of grants awaiting exchange */
  get size(): number {
    return this.grants.size;
  }

  private isExpired(grant: AuthorizationGrant): boolean {
    return this.ttlMs > 0 && this.now() - grant.createdAt > this.ttlMs;
  }

  private sweep(): void {
    if (this.ttlMs === 0) {
      return;
    }
    for (const [code, grant] of this.grants.entries()) {
      if (this.isExpired(grant)) {
        this.grants.delete(code);
      }
    }
  }
}
