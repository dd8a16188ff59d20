import type { MiddlewareHandler } from 'hono';
import type { OAuthEnv, Principal } from '../types/hono.js';
import type { Tenant } from '../types/tenant.js';
import type { User } from '../types/user.js';
import type { IStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { ERROR_INVALID_REQUEST } from '../errors/error-codes.js';
import { scopeService } from '../services/scope-service.js';
import { HEADER_AUTHORIZATION, HEADER_WWW_AUTHENTICATE } from '../config/constants.js';

export interface BearerAuthOptions {
  storage: IStorage;
  requiredScopes?: string[];
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  const match = /^Bearer\s+([^\s]+)\s*$/i.exec(authHeader);
  return match?.[1] ?? null;
}

/**
 * Validate a bearer token against the resolved tenant
 *
 * Expired and revoked tokens remain stored but are rejected here.
 */
export async function authenticateRequest(
  storage: IStorage,
  tenant: Tenant,
  authorizationHeader: string | undefined,
  requiredScopes: string[] = []
): Promise<Principal> {
  const value = authorizationHeader ? extractBearerToken(authorizationHeader) : null;

  if (!value) {
    throw new OAuthError(ERROR_INVALID_REQUEST, 'Missing or malformed bearer token', {
      statusCode: 401,
    });
  }

  const token = await storage.tokens.findByAccessToken(tenant.id, value);

  if (!token || token.accessRevokedAt || Date.now() >= token.accessExpiresAt.getTime()) {
    throw OAuthError.invalidToken();
  }

  if (token.tenantId !== tenant.id) {
    throw OAuthError.invalidToken('Token not valid for this tenant');
  }

  const scopes = scopeService.parseScopes(token.scope);
  if (!scopeService.hasAllScopes(scopes, requiredScopes)) {
    throw OAuthError.insufficientScope(`Required scopes: ${requiredScopes.join(' ')}`);
  }

  let user: User | null = null;
  if (token.userId) {
    user = await storage.users.findById(tenant.id, token.userId);
    if (!user || !user.active) {
      throw OAuthError.invalidToken();
    }
  }

  return { tenant, user, clientId: token.clientId, scopes, token };
}

/**
 * Build the RFC 6750 challenge for a failed request
 */
function challenge(realm: string, error: OAuthError | null, requiredScopes: string[]): string {
  if (!error) {
    return `Bearer realm="${realm}"`;
  }
  const scope = error.code === 'insufficient_scope' ? `, scope="${requiredScopes.join(' ')}"` : '';
  return `Bearer realm="${realm}", error="${error.code}"${scope}`;
}

/**
 * Middleware to validate opaque bearer tokens
 *
 * Sets `principal` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<OAuthEnv> {
  const { storage, requiredScopes = [] } = options;

  return async (c, next) => {
    const tenant = c.get('tenant');
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    let principal: Principal;
    try {
      principal = await authenticateRequest(storage, tenant, authHeader, requiredScopes);
    } catch (error) {
      if (error instanceof OAuthError) {
        c.header(HEADER_WWW_AUTHENTICATE, challenge(tenant.slug, authHeader ? error : null, requiredScopes));
      }
      throw error;
    }

    c.set('principal', principal);

    await next();
  };
}

/**
 * Create bearer auth middleware with specific required scopes
 */
export function requireScopes(
  options: Omit<BearerAuthOptions, 'requiredScopes'>,
  scopes: string[]
): MiddlewareHandler<OAuthEnv> {
  return bearerAuth({ ...options, requiredScopes: scopes });
}
