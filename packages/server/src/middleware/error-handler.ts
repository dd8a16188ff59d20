import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { OAuthEnv } from '../types/hono.js';
import type { Logger } from '../utils/logger.js';
import { describeError } from '../utils/logger.js';
import { OAuthError } from '../errors/oauth-error.js';
import { describeZodError } from './validation.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

/**
 * Global error handler
 *
 * Renders OAuthError as its JSON body. Anything else is logged and answered
 * with a generic server_error; internals never reach the client.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<OAuthEnv> {
  return (err, c) => {
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (err instanceof OAuthError) {
      if (err.statusCode >= 500) {
        logger.error('Request failed', { path: c.req.path, ...describeError(err.cause ?? err) });
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof ZodError) {
      return c.json(OAuthError.invalidRequest(describeZodError(err)).toJSON(), 400);
    }

    // Raised by Hono itself, e.g. for a malformed JSON body
    if (err instanceof HTTPException && err.status < 500) {
      return c.json(OAuthError.invalidRequest(err.message || undefined).toJSON(), 400);
    }

    logger.error('Unhandled error', { method: c.req.method, path: c.req.path, ...describeError(err) });

    return c.json(OAuthError.serverError().toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    if (c.req.path.includes('/authorize')) {
      c.header('Content-Security-Policy', "default-src 'self'; frame-ancestors 'none'; form-action 'self'");
    }

    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 *
 * Logs method, path, status and timing only; never bodies or credentials.
 */
export function requestLogger(logger: Logger): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    logger.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
      tenant: c.get('tenant')?.slug,
    });
  };
}
