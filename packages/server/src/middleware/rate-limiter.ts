import type { Context, MiddlewareHandler } from 'hono';
import type { OAuthEnv } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: Context) => string;
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Fixed-window in-memory rate limiter, per process
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<OAuthEnv> {
  const { windowMs, maxRequests, keyGenerator = defaultKeyGenerator } = options;

  const store = new Map<string, RateLimitEntry>();

  // Cleanup expired entries periodically
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, windowMs);

  // Prevent the interval from keeping the process alive
  cleanupInterval.unref();

  return async (c, next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = store.get(key);

    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + windowMs };
      store.set(key, entry);
    }

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Remaining', '0');

      throw OAuthError.temporarilyUnavailable(
        `Rate limit exceeded. Try again in ${retryAfter} seconds.`
      );
    }

    entry.count++;
    c.header('X-RateLimit-Remaining', String(maxRequests - entry.count));

    await next();
  };
}

/**
 * Default key: client address only, never a client-chosen header
 */
function defaultKeyGenerator(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
    c.req.header('x-real-ip') ??
    'unknown'
  );
}
