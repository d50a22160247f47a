/**
 * PKCE (RFC 7636) S256 verification.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

/** The only challenge method this server advertises or accepts */
export const PKCE_METHOD = 'S256';

/**
 * Derives the S256 challenge: base64url(sha256(verifier)) without padding.
 */
export function computeS256Challenge(codeVerifier: string): string {
  return createHash('sha256').update(codeVerifier, 'utf8').digest('base64url');
}

/**
 * Returns true iff the verifier reproduces the stored challenge.
 */
export function verifyPkce(codeVerifier: string, codeChallenge: string): boolean {
  const computed = Buffer.from(computeS256Challenge(codeVerifier), 'utf8');
  const expected = Buffer.from(codeChallenge, 'utf8');

  if (computed.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(computed, expected);
}
