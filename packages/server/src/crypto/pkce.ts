import { constantTimeCompare, sha256Base64Url } from './hash.js';
import { CODE_CHALLENGE_METHOD_S256 } from '../config/constants.js';

/**
 * Generate a code challenge from a code verifier using S256 method
 * RFC 7636 Section 4.2
 *
 * code_challenge = BASE64URL(SHA256(code_verifier))
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return sha256Base64Url(codeVerifier);
}

/**
 * Verify a code verifier against a stored code challenge
 * RFC 7636 Section 4.6
 */
export function verifyCodeChallenge(
  codeVerifier: string,
  codeChallenge: string,
  method: string
): boolean {
  if (method !== CODE_CHALLENGE_METHOD_S256) {
    return false;
  }

  return constantTimeCompare(generateCodeChallenge(codeVerifier), codeChallenge);
}

/**
 * Validate code verifier format
 * RFC 7636 Section 4.1
 *
 * 43-128 characters from [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
 */
export function isValidCodeVerifier(codeVerifier: string): boolean {
  if (codeVerifier.length < 43 || codeVerifier.length > 128) {
    return false;
  }

  return /^[A-Za-z0-9\-._~]+$/.test(codeVerifier);
}

/**
 * Validate code challenge format
 * S256 output is 32 bytes, 43 base64url characters without padding
 */
export function isValidCodeChallenge(codeChallenge: string): boolean {
  if (codeChallenge.length !== 43) {
    return false;
  }

  return /^[A-Za-z0-9\-_]+$/.test(codeChallenge);
}
