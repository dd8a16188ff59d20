import type { Context, MiddlewareHandler } from 'hono';
import { getCookie, setCookie, deleteCookie } from 'hono/cookie';
import type { OAuthEnv } from '../types/hono.js';
import type { User, UserRole } from '../types/user.js';
import type { IUserStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { signSession, verifySession } from '../crypto/session.js';
import { SESSION_COOKIE_NAME } from '../config/constants.js';

export interface SessionOptions {
  secret: string;
  ttl: number; // seconds
  secureCookie?: boolean;
}

export interface SessionAuthOptions {
  userStorage: IUserStorage;
  session: SessionOptions;
}

/**
 * Issue the session cookie for a user who just logged in
 */
export async function startSession(c: Context, user: User, options: SessionOptions): Promise<void> {
  const token = await signSession({ userId: user.id, tenantId: user.tenantId }, options.secret, options.ttl);

  setCookie(c, SESSION_COOKIE_NAME, token, {
    httpOnly: true,
    sameSite: 'Lax',
    path: '/',
    maxAge: options.ttl,
    secure: options.secureCookie ?? false,
  });
}

export function endSession(c: Context): void {
  deleteCookie(c, SESSION_COOKIE_NAME, { path: '/' });
}

/**
 * Middleware requiring a logged-in user of the resolved tenant
 *
 * A session established in one tenant is refused in every other tenant.
 * Sets `sessionUser` in context variables
 */
export function sessionAuth(options: SessionAuthOptions): MiddlewareHandler<OAuthEnv> {
  const { userStorage, session } = options;

  return async (c, next) => {
    const tenant = c.get('tenant');
    const cookie = getCookie(c, SESSION_COOKIE_NAME);
    const claims = cookie ? await verifySession(cookie, session.secret) : null;

    if (!claims) {
      throw OAuthError.loginRequired();
    }

    if (claims.tenantId !== tenant.id) {
      throw OAuthError.accessDenied('Session belongs to a different tenant');
    }

    const user = await userStorage.findById(tenant.id, claims.userId);
    if (!user || !user.active) {
      throw OAuthError.loginRequired();
    }

    c.set('sessionUser', user);

    await next();
  };
}

/**
 * Middleware restricting a route to the given roles; runs after sessionAuth
 */
export function requireRole(...roles: UserRole[]): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    const user = c.get('sessionUser');

    if (!roles.includes(user.role)) {
      throw OAuthError.accessDenied(
        roles.includes('admin') ? 'Admin access required' : 'Owner access required'
      );
    }

    await next();
  };
}
