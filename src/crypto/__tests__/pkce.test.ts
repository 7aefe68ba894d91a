import { describe, it, expect } from 'vitest';
import {
  generateCodeChallenge,
  verifyCodeChallenge,
  isValidCodeVerifier,
  isValidCodeChallenge,
} from '../pkce.js';
import { generateRandomBase64Url, generateUserCode, normalizeUserCode } from '../random.js';

describe('PKCE', () => {
  // RFC 7636 Appendix B
  const verifier = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
  const challenge = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

  it('should derive the S256 challenge', () => {
    expect(generateCodeChallenge(verifier)).toBe(challenge);
  });

  it('should accept the matching verifier', () => {
    expect(verifyCodeChallenge(verifier, challenge, 'S256')).toBe(true);
  });

  it('should reject any other verifier', () => {
    expect(verifyCodeChallenge(`${verifier}x`, challenge, 'S256')).toBe(false);
    expect(verifyCodeChallenge(generateRandomBase64Url(32), challenge, 'S256')).toBe(false);
  });

  it('should reject the plain method even when the values match', () => {
    expect(verifyCodeChallenge(verifier, verifier, 'plain')).toBe(false);
  });

  it('should validate verifier format', () => {
    expect(isValidCodeVerifier(verifier)).toBe(true);
    expect(isValidCodeVerifier('a'.repeat(42))).toBe(false);
    expect(isValidCodeVerifier('a'.repeat(129))).toBe(false);
    expect(isValidCodeVerifier(`${'a'.repeat(42)}!`)).toBe(false);
  });

  it('should validate challenge format', () => {
    expect(isValidCodeChallenge(challenge)).toBe(true);
    expect(isValidCodeChallenge(challenge.slice(1))).toBe(false);
    expect(isValidCodeChallenge(`${challenge.slice(1)}=`)).toBe(false);
  });
});

describe('user codes', () => {
  it('should generate XXXX-XXXX codes without vowels or digits', () => {
    for (let i = 0; i < 20; i++) {
      expect(generateUserCode()).toMatch(/^[BCDFGHJKLMNPQRSTVWXZ]{4}-[BCDFGHJKLMNPQRSTVWXZ]{4}$/);
    }
  });

  it('should normalize what users type', () => {
    expect(normalizeUserCode('bcdf-ghjk')).toBe('BCDF-GHJK');
    expect(normalizeUserCode('bcdfghjk')).toBe('BCDF-GHJK');
    expect(normalizeUserCode(' BCDF GHJK ')).toBe('BCDF-GHJK');
  });
});
