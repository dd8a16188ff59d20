import { describe, it, expect } from 'vitest';
import { SignJWT } from 'jose';
import { hashSecret, verifySecret, hashToken, constantTimeCompare, sha256Base64Url } from '../../crypto/hash.js';
import {
  generateCodeChallenge,
  verifyCodeChallenge,
  isValidCodeVerifier,
  isValidCodeChallenge,
} from '../../crypto/pkce.js';
import { signSession, verifySession } from '../../crypto/session.js';
import { generateAccessToken, generateClientId } from '../../crypto/random.js';

describe('Secret hashing', () => {
  it('should verify the original secret', async () => {
    const encoded = await hashSecret('test-secret');

    expect(encoded.startsWith('$scrypt$16384$8$1$')).toBe(true);
    expect(await verifySecret('test-secret', encoded)).toBe(true);
  });

  it('should reject a different secret', async () => {
    const encoded = await hashSecret('test-secret');

    expect(await verifySecret('other-secret', encoded)).toBe(false);
  });

  it('should salt each hash', async () => {
    const [first, second] = await Promise.all([hashSecret('test-secret'), hashSecret('test-secret')]);

    expect(first).not.toBe(second);
  });

  it('should reject malformed hashes', async () => {
    expect(await verifySecret('test-secret', 'plaintext')).toBe(false);
    expect(await verifySecret('test-secret', '$bcrypt$10$abc$def')).toBe(false);
    expect(await verifySecret('test-secret', '$scrypt$x$8$1$c2FsdA==$aGFzaA==')).toBe(false);
  });
});

describe('Token hashing', () => {
  it('should be deterministic hex SHA-256', () => {
    expect(hashToken('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should compare strings in constant time', () => {
    expect(constantTimeCompare('same', 'same')).toBe(true);
    expect(constantTimeCompare('same', 'diff')).toBe(false);
    expect(constantTimeCompare('short', 'longer')).toBe(false);
  });
});

describe('PKCE', () => {
  // RFC 7636 Appendix B
  const verifier = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
  const challenge = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

  it('should derive the S256 challenge', () => {
    expect(generateCodeChallenge(verifier)).toBe(challenge);
    expect(sha256Base64Url(verifier)).toBe(challenge);
  });

  it('should verify only S256 challenges', () => {
    expect(verifyCodeChallenge(verifier, challenge, 'S256')).toBe(true);
    expect(verifyCodeChallenge(verifier, verifier, 'plain')).toBe(false);
    expect(verifyCodeChallenge('x'.repeat(43), challenge, 'S256')).toBe(false);
  });

  it('should validate verifier length and alphabet', () => {
    expect(isValidCodeVerifier(verifier)).toBe(true);
    expect(isValidCodeVerifier('a'.repeat(42))).toBe(false);
    expect(isValidCodeVerifier('a'.repeat(128))).toBe(true);
    expect(isValidCodeVerifier('a'.repeat(129))).toBe(false);
    expect(isValidCodeVerifier(`${'a'.repeat(42)}!`)).toBe(false);
  });

  it('should validate challenge format', () => {
    expect(isValidCodeChallenge(challenge)).toBe(true);
    expect(isValidCodeChallenge(challenge.slice(1))).toBe(false);
    expect(isValidCodeChallenge(`${challenge.slice(1)}=`)).toBe(false);
  });
});

describe('Random values', () => {
  it('should produce base64url strings of the expected length', () => {
    // 32 bytes encode to 43 characters
    expect(generateAccessToken()).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(generateClientId(16)).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });

  it('should not repeat', () => {
    expect(generateAccessToken()).not.toBe(generateAccessToken());
  });
});

describe('Session tokens', () => {
  const claims = { userId: 'user-1', tenantId: 'tenant-1' };

  it('should round-trip the claims', async () => {
    const token = await signSession(claims, 'test-secret', 60);

    expect(await verifySession(token, 'test-secret')).toEqual(claims);
  });

  it('should reject another signing key', async () => {
    const token = await signSession(claims, 'test-secret', 60);

    expect(await verifySession(token, 'other-secret')).toBeNull();
  });

  it('should reject expired sessions', async () => {
    const secret = new TextEncoder().encode('test-secret');
    const now = Math.floor(Date.now() / 1000);
    const token = await new SignJWT({ tid: 'tenant-1' })
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('user-1')
      .setIssuedAt(now - 120)
      .setExpirationTime(now - 60)
      .sign(secret);

    expect(await verifySession(token, 'test-secret')).toBeNull();
  });

  it('should reject tokens without the tenant claim', async () => {
    const token = await new SignJWT({})
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('user-1')
      .sign(new TextEncoder().encode('test-secret'));

    expect(await verifySession(token, 'test-secret')).toBeNull();
  });

  it('should reject garbage', async () => {
    expect(await verifySession('not-a-jwt', 'test-secret')).toBeNull();
  });
});
