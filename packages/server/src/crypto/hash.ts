import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

const SCRYPT_PARAMS: ScryptParams = { N: 16384, r: 8, p: 1 };
const SCRYPT_KEY_LENGTH = 64;
const SCRYPT_SALT_LENGTH = 16;

/**
 * Promisified scrypt function
 */
function scryptAsync(
  secret: string,
  salt: Buffer,
  keyLength: number,
  options: ScryptParams
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(secret, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256 (for tokens, codes)
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Hash a value using SHA-256 and return as base64url
 */
export function sha256Base64Url(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64url');
}

/**
 * Compare two strings in constant time
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

/**
 * Hash a password or client secret with salted scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_LENGTH);
  const { N, r, p } = SCRYPT_PARAMS;

  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, SCRYPT_PARAMS);

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

interface ParsedHash {
  params: ScryptParams;
  salt: Buffer;
  hash: Buffer;
}

function parseHash(encoded: string): ParsedHash | null {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, algorithm, n, r, p, salt, hash] = encoded.split('$');

  if (empty !== '' || algorithm !== 'scrypt' || !n || !r || !p || !salt || !hash) {
    return null;
  }

  const params = { N: parseInt(n, 10), r: parseInt(r, 10), p: parseInt(p, 10) };
  if (Object.values(params).some((value) => Number.isNaN(value))) {
    return null;
  }

  return {
    params,
    salt: Buffer.from(salt, 'base64'),
    hash: Buffer.from(hash, 'base64'),
  };
}

/**
 * Verify a password or client secret against its stored hash
 */
export async function verifySecret(secret: string, encoded: string): Promise<boolean> {
  const parsed = parseHash(encoded);
  if (!parsed || parsed.hash.length === 0) {
    return false;
  }

  const derived = await scryptAsync(secret, parsed.salt, parsed.hash.length, parsed.params);

  return timingSafeEqual(parsed.hash, derived);
}

let dummyHash: Promise<string> | null = null;

/**
 * Hash verified in place of a stored one when the account or client is
 * unknown, so both paths cost one scrypt run
 */
export function dummySecretHash(): Promise<string> {
  dummyHash ??= hashSecret('tenant-oauth-dummy-secret');
  return dummyHash;
}

/**
 * Hash for token lookup (tokens are random and high-entropy)
 */
export function hashToken(token: string): string {
  return sha256(token);
}
