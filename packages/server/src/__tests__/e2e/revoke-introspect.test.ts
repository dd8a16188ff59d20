import { describe, it, expect, beforeEach } from 'vitest';
import type { IntrospectionResponse } from '@tenant-oauth/shared';
import {
  setupTestContext,
  passwordGrant,
  confidentialTokenRequest,
  tenantHeader,
  basicAuth,
  FORM,
  PASSWORDS,
  type TestContext,
  type TokenResponse,
  type ErrorResponse,
} from '../test-setup.js';
import { CredentialService } from '../../services/credential-service.js';

describe('Token revocation and introspection', () => {
  let ctx: TestContext;
  let tokens: TokenResponse;

  beforeEach(async () => {
    ctx = await setupTestContext();
    const res = await passwordGrant(ctx, 'alice', PASSWORDS.alice, 'read email');
    tokens = (await res.json()) as TokenResponse;
  });

  function revoke(params: Record<string, string>): Response | Promise<Response> {
    return ctx.app.request('/oauth/revoke', {
      method: 'POST',
      headers: {
        ...tenantHeader('acme'),
        ...FORM,
        Authorization: basicAuth(ctx.confidentialClientId, ctx.confidentialClientSecret),
      },
      body: new URLSearchParams(params),
    });
  }

  async function introspect(params: Record<string, string>): Promise<IntrospectionResponse> {
    const res = await ctx.app.request('/oauth/introspect', {
      method: 'POST',
      headers: {
        ...tenantHeader('acme'),
        ...FORM,
        Authorization: basicAuth(ctx.confidentialClientId, ctx.confidentialClientSecret),
      },
      body: new URLSearchParams(params),
    });
    expect(res.status).toBe(200);
    return (await res.json()) as IntrospectionResponse;
  }

  function refresh(refreshToken: string): Promise<Response> {
    return confidentialTokenRequest(ctx, { grant_type: 'refresh_token', refresh_token: refreshToken });
  }

  describe('Introspection', () => {
    it('should describe an active access token', async () => {
      const body = await introspect({ token: tokens.access_token });

      const stored = await ctx.storage.tokens.findByAccessToken(ctx.acme.id, tokens.access_token);
      expect(body).toEqual({
        active: true,
        client_id: ctx.confidentialClientId,
        scope: 'read email',
        token_type: 'Bearer',
        exp: Math.floor((stored?.accessExpiresAt.getTime() ?? 0) / 1000),
        iat: Math.floor((stored?.issuedAt.getTime() ?? 0) / 1000),
        iss: 'http://localhost:5000/tenants/acme',
        sub: ctx.alice.id,
        username: 'alice',
      });
    });

    it('should describe a refresh token with the refresh hint', async () => {
      const body = await introspect({ token: tokens.refresh_token ?? '', token_type_hint: 'refresh_token' });

      expect(body.active).toBe(true);
      expect(body.username).toBe('alice');
    });

    it('should report unknown tokens as inactive', async () => {
      const body = await introspect({ token: 'unknown-token' });

      expect(body).toEqual({ active: false });
    });

    it('should omit the user for client credentials tokens', async () => {
      const res = await confidentialTokenRequest(ctx, { grant_type: 'client_credentials', scope: 'read' });
      const { access_token } = (await res.json()) as TokenResponse;

      const body = await introspect({ token: access_token });

      expect(body.active).toBe(true);
      expect(body.sub).toBeUndefined();
      expect(body.username).toBeUndefined();
    });

    it('should refuse public clients', async () => {
      const res = await ctx.app.request('/oauth/introspect', {
        method: 'POST',
        headers: { ...tenantHeader('acme'), ...FORM },
        body: new URLSearchParams({ client_id: ctx.publicClientId, token: tokens.access_token }),
      });

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('invalid_client');
    });

    it('should not authenticate an acme client in another tenant', async () => {
      const res = await ctx.app.request('/oauth/introspect', {
        method: 'POST',
        headers: {
          ...tenantHeader('beta'),
          ...FORM,
          Authorization: basicAuth(ctx.confidentialClientId, ctx.confidentialClientSecret),
        },
        body: new URLSearchParams({ token: tokens.access_token }),
      });

      expect(res.status).toBe(401);
    });

    it('should report an acme token as inactive to a beta client', async () => {
      const { client, clientSecret } = await new CredentialService(ctx.storage).registerClient(
        ctx.beta,
        ctx.betaOwner,
        {
          name: 'Beta Gateway',
          redirectUris: ['http://localhost:3002/callback'],
          grantTypes: ['client_credentials'],
          scopes: ['read'],
          authMethod: 'client_secret_basic',
        }
      );

      const res = await ctx.app.request('/oauth/introspect', {
        method: 'POST',
        headers: {
          ...tenantHeader('beta'),
          ...FORM,
          Authorization: basicAuth(client.clientId, clientSecret ?? ''),
        },
        body: new URLSearchParams({ token: tokens.access_token }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ active: false });
    });

    it('should require the token parameter', async () => {
      const res = await ctx.app.request('/oauth/introspect', {
        method: 'POST',
        headers: {
          ...tenantHeader('acme'),
          ...FORM,
          Authorization: basicAuth(ctx.confidentialClientId, ctx.confidentialClientSecret),
        },
        body: new URLSearchParams({}),
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body).toEqual({ error: 'invalid_request', error_description: 'Missing token parameter' });
    });
  });

  describe('Revocation', () => {
    it('should revoke an access token and leave the refresh token usable', async () => {
      const res = await revoke({ token: tokens.access_token });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});

      expect(await introspect({ token: tokens.access_token })).toEqual({ active: false });
      expect((await refresh(tokens.refresh_token ?? '')).status).toBe(200);
    });

    it('should revoke a refresh token together with its access token', async () => {
      const res = await revoke({ token: tokens.refresh_token ?? '', token_type_hint: 'refresh_token' });

      expect(res.status).toBe(200);
      expect(await introspect({ token: tokens.access_token })).toEqual({ active: false });

      const refreshed = await refresh(tokens.refresh_token ?? '');
      expect(refreshed.status).toBe(400);
    });

    it('should find a refresh token without a hint', async () => {
      await revoke({ token: tokens.refresh_token ?? '' });

      const stored = await ctx.storage.tokens.findByRefreshToken(ctx.acme.id, tokens.refresh_token ?? '');
      expect(stored?.refreshRevokedAt).toBeInstanceOf(Date);
    });

    it('should succeed when revoking an already revoked token', async () => {
      const first = await revoke({ token: tokens.access_token });
      const revokedAt = (await ctx.storage.tokens.findByAccessToken(ctx.acme.id, tokens.access_token))
        ?.accessRevokedAt;

      const second = await revoke({ token: tokens.access_token });

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(await second.json()).toEqual({});
      expect(revokedAt).toBeInstanceOf(Date);
      const stored = await ctx.storage.tokens.findByAccessToken(ctx.acme.id, tokens.access_token);
      expect(stored?.accessRevokedAt).toEqual(revokedAt);
    });

    it('should answer 200 for unknown tokens', async () => {
      const res = await revoke({ token: 'unknown-token' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
    });

    it('should ignore unknown hints', async () => {
      const res = await revoke({ token: tokens.access_token, token_type_hint: 'id_token' });

      expect(res.status).toBe(200);
      expect(await introspect({ token: tokens.access_token })).toEqual({ active: false });
    });

    it('should not let a client revoke another client token', async () => {
      const res = await ctx.app.request('/oauth/revoke', {
        method: 'POST',
        headers: { ...tenantHeader('acme'), ...FORM },
        body: new URLSearchParams({ client_id: ctx.publicClientId, token: tokens.access_token }),
      });

      expect(res.status).toBe(200);
      expect((await introspect({ token: tokens.access_token })).active).toBe(true);
    });

    it('should require the token parameter', async () => {
      const res = await revoke({});

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('invalid_request');
    });
  });
});
