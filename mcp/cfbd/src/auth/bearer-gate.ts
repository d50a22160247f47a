/**
 * Bearer token gate for the MCP endpoint.
 *
 * Runs before the Streamable HTTP transport sees the request, so a rejected
 * caller never reaches the tool dispatcher or allocates a transport session.
 */

import { timingSafeEqual } from 'node:crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { TokenStore } from './token-store.js';
import { logger, redact } from '../lib/logger.js';

export interface BearerGateOptions {
  tokenStore: TokenStore;
  /** Operator credential accepted in addition to issued tokens. It never expires and cannot be revoked */
  sharedSecret?: string;
}

const BEARER_PATTERN = /^Bearer ([^\s]+)$/;

/**
 * Extracts the token from an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  return BEARER_PATTERN.exec(header.trim())?.[1];
}

function matchesSecret(token: string, secret: string | undefined): boolean {
  if (!secret) {
    return false;
  }
  const a = Buffer.from(token, 'utf8');
  const b = Buffer.from(secret, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

function reject(res: Response, reason: string): void {
  res
    .status(401)
    .set('WWW-Authenticate', 'Bearer')
    .type('text/plain')
    .send(`Unauthorized: ${reason}`);
}

export function createBearerGate(options: BearerGateOptions): RequestHandler {
  const { tokenStore, sharedSecret } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      logger.warn('Unauthorized access attempt: missing or invalid header', {
        path: req.originalUrl,
      });
      reject(res, 'Missing or invalid header');
      return;
    }

    if (!tokenStore.contains(token) && !matchesSecret(token, sharedSecret)) {
      logger.warn('Unauthorized access attempt: token not recognized', {
        token: redact(token),
      });
      reject(res, 'Token not recognized');
      return;
    }

    logger.debug('Authorized request', { token: redact(token) });
    next();
  };
}
