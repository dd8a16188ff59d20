import { describe, it, expect, beforeEach } from 'vitest';
import { TokenService, toTokenResponse } from '../../services/token-service.js';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import type { Tenant } from '../../types/tenant.js';
import type { OAuthClient } from '../../types/client.js';
import type { User } from '../../types/user.js';
import type { IssuedToken } from '../../types/token.js';

describe('TokenService', () => {
  const service = new TokenService({ accessTokenTtl: 3600, refreshTokenTtl: 86400 });

  let storage: MemoryStorage;
  let tenant: Tenant;
  let other: Tenant;
  let user: User;
  let client: OAuthClient;

  beforeEach(async () => {
    storage = createMemoryStorage();
    tenant = await storage.tenants.create({ name: 'Acme', slug: 'acme' });
    other = await storage.tenants.create({ name: 'Beta', slug: 'beta' });
    user = await storage.users.create({
      tenantId: tenant.id,
      username: 'alice',
      email: 'alice@acme.test',
      passwordHash: 'hash',
    });
    ({ client } = await storage.clients.create({
      tenantId: tenant.id,
      ownerUserId: user.id,
      name: 'Acme Backend',
      authMethod: 'client_secret_basic',
      redirectUris: ['http://localhost:3001/callback'],
      allowedGrants: ['password', 'client_credentials', 'refresh_token'],
      allowedScopes: ['read', 'write'],
    }));
  });

  describe('issue', () => {
    it('should issue a refresh token when the client may refresh', async () => {
      const response = await service.issue({
        tokenStorage: storage.tokens,
        tenant,
        client,
        user,
        scopes: ['read'],
        grantType: 'password',
      });

      expect(response.refresh_token).toBeTruthy();
      expect(response.scope).toBe('read');
      expect(response.expires_in).toBe(3600);
    });

    it('should never issue a refresh token for client credentials', async () => {
      const response = await service.issue({
        tokenStorage: storage.tokens,
        tenant,
        client,
        user: null,
        scopes: ['read'],
        grantType: 'client_credentials',
      });

      expect(response.refresh_token).toBeUndefined();
    });

    it('should refuse to mix tenants', async () => {
      await expect(
        service.issue({
          tokenStorage: storage.tokens,
          tenant: other,
          client,
          user,
          scopes: ['read'],
          grantType: 'password',
        })
      ).rejects.toMatchObject({ code: 'invalid_grant' });
    });
  });

  describe('revoke', () => {
    let issued: IssuedToken;

    beforeEach(async () => {
      issued = await storage.tokens.create({
        tenantId: tenant.id,
        clientId: client.clientId,
        userId: user.id,
        scope: 'read',
        accessExpiresAt: new Date(Date.now() + 3600 * 1000),
        refreshExpiresAt: new Date(Date.now() + 86400 * 1000),
      });
    });

    it('should revoke only the access token by default', async () => {
      expect(await service.revoke(storage.tokens, tenant.id, client.clientId, issued.accessToken)).toBe(true);

      const stored = await storage.tokens.findByAccessToken(tenant.id, issued.accessToken);
      expect(stored?.accessRevokedAt).toBeInstanceOf(Date);
      expect(stored?.refreshRevokedAt).toBeNull();
    });

    it('should revoke the pair for a refresh token', async () => {
      const refreshToken = issued.refreshToken ?? '';

      expect(await service.revoke(storage.tokens, tenant.id, client.clientId, refreshToken, 'refresh_token')).toBe(
        true
      );

      const stored = await storage.tokens.findByRefreshToken(tenant.id, refreshToken);
      expect(stored?.accessRevokedAt).toBeInstanceOf(Date);
      expect(stored?.refreshRevokedAt).toBeInstanceOf(Date);
    });

    it('should fall back to the other lookup when the hint is wrong', async () => {
      expect(
        await service.revoke(storage.tokens, tenant.id, client.clientId, issued.accessToken, 'refresh_token')
      ).toBe(true);
    });

    it('should leave tokens of other clients alone', async () => {
      expect(await service.revoke(storage.tokens, tenant.id, 'other-client', issued.accessToken)).toBe(false);

      const stored = await storage.tokens.findByAccessToken(tenant.id, issued.accessToken);
      expect(stored?.accessRevokedAt).toBeNull();
    });

    it('should report unknown tokens', async () => {
      expect(await service.revoke(storage.tokens, tenant.id, client.clientId, 'unknown')).toBe(false);
      expect(await service.revoke(storage.tokens, other.id, client.clientId, issued.accessToken)).toBe(false);
    });
  });

  it('should derive expires_in from the stored expiry', () => {
    const now = new Date('2024-01-01T00:00:00Z');
    const response = toTokenResponse(
      {
        accessToken: 'access',
        token: {
          id: 'id',
          tenantId: 't',
          clientId: 'c',
          userId: null,
          scope: 'read',
          accessTokenHash: 'h',
          refreshTokenHash: null,
          familyId: 'f',
          parentTokenId: null,
          issuedAt: now,
          accessExpiresAt: new Date(now.getTime() + 1500),
          refreshExpiresAt: null,
          accessRevokedAt: null,
          refreshRevokedAt: null,
        },
      },
      now
    );

    expect(response).toEqual({ access_token: 'access', token_type: 'Bearer', expires_in: 2, scope: 'read' });
  });
});
