import { Hono } from 'hono';
import type { UserInfoResponse } from '@tenant-oauth/shared';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { scopeService } from '../../services/scope-service.js';
import { EMAIL_SCOPE, PROFILE_SCOPE } from '../../config/constants.js';

export interface UserInfoRouteOptions {
  storage: IStorage;
}

/**
 * Claims about the user behind a bearer token
 *
 * `email` needs the email scope and `created_at` the profile scope.
 */
export function createUserInfoRoutes(options: UserInfoRouteOptions) {
  const { storage } = options;

  const router = new Hono<OAuthEnv>();

  router.get('/', bearerAuth({ storage }), (c) => {
    const { user, scopes } = c.get('principal');

    // Client credentials tokens have no user
    if (!user) {
      throw OAuthError.notFound('User not found');
    }

    const response: UserInfoResponse = {
      sub: user.id,
      username: user.username,
    };

    if (scopeService.hasScope(scopes, EMAIL_SCOPE)) {
      response.email = user.email;
    }

    if (scopeService.hasScope(scopes, PROFILE_SCOPE)) {
      response.created_at = user.createdAt.toISOString();
    }

    return c.json(response);
  });

  return router;
}
