import type { ConsentPrompt } from '@tenant-oauth/shared';
import type { OAuthContext } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { isGrantAllowed, isRedirectUriRegistered, requiresPkce } from '../../services/client-policy.js';
import { isValidCodeChallenge } from '../../crypto/pkce.js';
import { parseForm } from '../../utils/form.js';
import { tenantIssuer } from '../../utils/issuer.js';
import {
  RESPONSE_TYPE_CODE,
  CODE_CHALLENGE_METHOD_S256,
  GRANT_TYPE_AUTHORIZATION_CODE,
} from '../../config/constants.js';

export interface AuthorizeHandlerOptions {
  storage: IStorage;
  issuer: string;
  authorizationCodeTtl: number; // seconds
}

/**
 * Handle the authorization endpoint (GET/POST /oauth/authorize)
 *
 * Runs behind session auth, so a user is always logged in here.
 * 1. Validate client_id and redirect_uri; failures are answered directly
 * 2. Validate the rest; failures are redirected to the client
 * 3. GET returns the consent prompt, POST records the decision
 * 4. On approval, redirect to the client with a single-use code
 */
export function createAuthorizeHandler(options: AuthorizeHandlerOptions) {
  const { storage, issuer, authorizationCodeTtl } = options;

  return async (c: OAuthContext) => {
    const tenant = c.get('tenant');
    const user = c.get('sessionUser');

    // Query parameters for GET; the consent form may repeat them in the body
    const query = Object.fromEntries(new URL(c.req.url).searchParams);
    const params = c.req.method === 'GET' ? query : { ...query, ...(await parseForm(c)) };

    const responseType = params['response_type'];
    const clientId = params['client_id'];
    const redirectUri = params['redirect_uri'];
    const state = params['state'] || undefined;
    const codeChallenge = params['code_challenge'] || undefined;
    const codeChallengeMethod = params['code_challenge_method'] || undefined;

    if (!clientId) {
      throw OAuthError.invalidRequest('Missing client_id parameter');
    }

    const client = await storage.clients.findByClientId(tenant.id, clientId);
    if (!client) {
      throw OAuthError.invalidRequest('Unknown client_id');
    }

    if (!redirectUri) {
      throw OAuthError.invalidRequest('Missing redirect_uri parameter');
    }

    // Never redirect to an unregistered URI
    if (!isRedirectUriRegistered(client, redirectUri)) {
      throw OAuthError.invalidRequest('Invalid redirect_uri');
    }

    const iss = tenantIssuer(issuer, tenant);

    const redirectWithError = (error: OAuthError) => {
      const separator = redirectUri.includes('?') ? '&' : '?';
      return c.redirect(`${redirectUri}${separator}${error.toQueryString({ iss })}`);
    };

    if (responseType !== RESPONSE_TYPE_CODE) {
      return redirectWithError(
        OAuthError.unsupportedResponseType('Only "code" response type is supported', state)
      );
    }

    if (!isGrantAllowed(client, GRANT_TYPE_AUTHORIZATION_CODE)) {
      return redirectWithError(
        OAuthError.unauthorizedClient('Client is not authorized for authorization code grant', state)
      );
    }

    if (codeChallenge) {
      if (codeChallengeMethod !== CODE_CHALLENGE_METHOD_S256) {
        return redirectWithError(
          OAuthError.invalidRequest('Only S256 code_challenge_method is supported', state)
        );
      }
      if (!isValidCodeChallenge(codeChallenge)) {
        return redirectWithError(OAuthError.invalidRequest('Invalid code_challenge format', state));
      }
    } else if (requiresPkce(client)) {
      return redirectWithError(
        OAuthError.invalidRequest('Missing code_challenge parameter (PKCE required)', state)
      );
    }

    let scopes: string[];
    try {
      scopes = scopeService.validateScopes(scopeService.parseScopes(params['scope']), client, state);
    } catch (error) {
      if (error instanceof OAuthError) {
        return redirectWithError(error);
      }
      throw error;
    }

    if (c.req.method === 'GET') {
      const prompt: ConsentPrompt = {
        client_id: client.clientId,
        client_name: client.name,
        scope: scopeService.formatScopes(scopes),
        redirect_uri: redirectUri,
      };
      if (state) {
        prompt.state = state;
      }
      if (codeChallenge) {
        prompt.code_challenge = codeChallenge;
        prompt.code_challenge_method = CODE_CHALLENGE_METHOD_S256;
      }
      return c.json(prompt);
    }

    if (params['confirm'] !== 'yes') {
      return redirectWithError(OAuthError.accessDenied('User denied the authorization request', state));
    }

    const { value: code } = await storage.authorizationCodes.create({
      tenantId: tenant.id,
      clientId: client.clientId,
      userId: user.id,
      redirectUri,
      scope: scopeService.formatScopes(scopes),
      codeChallenge: codeChallenge ?? null,
      codeChallengeMethod: codeChallenge ? CODE_CHALLENGE_METHOD_S256 : null,
      expiresAt: new Date(Date.now() + authorizationCodeTtl * 1000),
    });

    const url = new URL(redirectUri);
    url.searchParams.set('code', code);
    if (state) {
      url.searchParams.set('state', state);
    }
    url.searchParams.set('iss', iss);

    return c.redirect(url.toString());
  };
}
