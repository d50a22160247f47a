import { describe, it, expect } from 'vitest';
import { computeS256Challenge, verifyPkce } from './pkce.js';

const RFC_VERIFIER = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
const RFC_CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

describe('PKCE S256', () => {
  it('derives the RFC 7636 appendix B challenge', () => {
    expect(computeS256Challenge(RFC_VERIFIER)).toBe(RFC_CHALLENGE);
  });

  it('accepts the matching verifier', () => {
    expect(verifyPkce(RFC_VERIFIER, RFC_CHALLENGE)).toBe(true);
  });

  it('rejects a verifier altered by one character', () => {
    const altered = RFC_VERIFIER.slice(0, -1) + 'j';
    expect(verifyPkce(altered, RFC_CHALLENGE)).toBe(false);
  });

  it('produces unpadded url-safe output', () => {
    for (const verifier of ['a', 'bb', 'test-verifier-with-some-length', RFC_VERIFIER]) {
      const challenge = computeS256Challenge(verifier);
      expect(challenge).toHaveLength(43);
      expect(challenge).toMatch(/^[A-Za-z0-9_-]+$/);
    }
  });

  it('rejects a challenge of different length without throwing', () => {
    expect(verifyPkce(RFC_VERIFIER, RFC_CHALLENGE + '=')).toBe(false);
    expect(verifyPkce(RFC_VERIFIER, '')).toBe(false);
  });

  it('rejects a plain challenge equal to the verifier', () => {
    expect(verifyPkce(RFC_VERIFIER, RFC_VERIFIER)).toBe(false);
  });
});
