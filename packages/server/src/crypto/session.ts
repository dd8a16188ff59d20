import * as jose from 'jose';

const SESSION_ALGORITHM = 'HS256';

/**
 * Claims carried by the login session cookie
 */
export interface SessionClaims {
  userId: string;
  tenantId: string;
}

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a session token bound to one user in one tenant
 */
export async function signSession(
  claims: SessionClaims,
  secret: string,
  ttlSeconds: number
): Promise<string> {
  return new jose.SignJWT({ tid: claims.tenantId })
    .setProtectedHeader({ alg: SESSION_ALGORITHM, typ: 'JWT' })
    .setSubject(claims.userId)
    .setIssuedAt()
    .setExpirationTime(`${ttlSeconds}s`)
    .sign(secretKey(secret));
}

/**
 * Verify a session token
 *
 * Returns null for tokens that are malformed, expired or signed with another key.
 */
export async function verifySession(token: string, secret: string): Promise<SessionClaims | null> {
  let payload: jose.JWTPayload;
  try {
    ({ payload } = await jose.jwtVerify(token, secretKey(secret), {
      algorithms: [SESSION_ALGORITHM],
    }));
  } catch (error) {
    if (error instanceof jose.errors.JOSEError) {
      return null;
    }
    throw error;
  }

  const tenantId = payload['tid'];
  if (typeof payload.sub !== 'string' || typeof tenantId !== 'string') {
    return null;
  }

  return { userId: payload.sub, tenantId };
}
