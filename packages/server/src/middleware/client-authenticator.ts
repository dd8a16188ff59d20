import type { MiddlewareHandler } from 'hono';
import type { OAuthEnv } from '../types/hono.js';
import type { OAuthClient, AuthenticatedClient, ClientAuthMethod } from '../types/client.js';
import type { IClientStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { verifySecret, dummySecretHash } from '../crypto/hash.js';
import { parseForm } from '../utils/form.js';
import {
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_NONE,
  HEADER_AUTHORIZATION,
} from '../config/constants.js';

export interface ClientAuthenticatorOptions {
  clientStorage: IClientStorage;
  allowPublicClients?: boolean; // Allow clients with auth_method='none'
}

interface ClientCredentials {
  clientId: string;
  clientSecret?: string;
}

// One message for every failure whether or not the client id exists
const CLIENT_AUTH_FAILED = 'Client authentication failed';

/**
 * Extract client credentials from Basic auth header
 * RFC 6749 Section 2.3.1: id and secret are form-urlencoded before base64
 */
function extractBasicAuth(authHeader: string): ClientCredentials | null {
  if (!/^basic /i.test(authHeader)) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6).trim(), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex).replace(/\+/g, ' ')),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1).replace(/\+/g, ' ')),
    };
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }
}

async function verifyClientSecret(client: OAuthClient, secret: string | undefined): Promise<boolean> {
  if (!secret || !client.clientSecretHash) {
    return false;
  }
  return verifySecret(secret, client.clientSecretHash);
}

/**
 * Middleware to authenticate OAuth clients
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in POST body
 * - none: Public clients identified by client_id only
 *
 * The method used must be the one the client registered. Sets `client`
 * in context variables on success.
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<OAuthEnv> {
  const { clientStorage, allowPublicClients = true } = options;

  return async (c, next) => {
    const tenant = c.get('tenant');
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    let credentials: ClientCredentials | null = null;
    let presentedMethod: ClientAuthMethod;

    if (authHeader && /^basic /i.test(authHeader)) {
      credentials = extractBasicAuth(authHeader);
      presentedMethod = CLIENT_AUTH_BASIC;
    } else {
      const form = await parseForm(c);
      const clientId = form['client_id'];
      if (clientId) {
        credentials = { clientId, clientSecret: form['client_secret'] };
      }
      presentedMethod = form['client_secret'] ? CLIENT_AUTH_POST : CLIENT_AUTH_NONE;
    }

    if (!credentials) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const client = await clientStorage.findByClientId(tenant.id, credentials.clientId);

    if (!client || client.authMethod !== presentedMethod) {
      if (credentials.clientSecret) {
        await verifySecret(credentials.clientSecret, await dummySecretHash());
      }
      throw OAuthError.invalidClient(CLIENT_AUTH_FAILED);
    }

    if (presentedMethod === CLIENT_AUTH_NONE) {
      if (!allowPublicClients) {
        throw OAuthError.invalidClient(CLIENT_AUTH_FAILED);
      }
    } else if (!(await verifyClientSecret(client, credentials.clientSecret))) {
      throw OAuthError.invalidClient(CLIENT_AUTH_FAILED);
    }

    const authenticatedClient: AuthenticatedClient = {
      client,
      authMethod: presentedMethod,
    };
    c.set('client', authenticatedClient);

    await next();
  };
}
