import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import { ConflictError } from '../../errors/storage-error.js';
import type { Tenant } from '../../types/tenant.js';

describe('MemoryStorage', () => {
  let storage: MemoryStorage;
  let tenant: Tenant;

  beforeEach(async () => {
    storage = createMemoryStorage();
    tenant = await storage.tenants.create({ name: 'Acme', slug: 'acme' });
  });

  function createToken(overrides: { familyId?: string; withRefresh?: boolean } = {}) {
    const now = Date.now();
    return storage.tokens.create({
      tenantId: tenant.id,
      clientId: 'client-1',
      userId: 'user-1',
      scope: 'read',
      accessExpiresAt: new Date(now + 3600 * 1000),
      refreshExpiresAt: overrides.withRefresh === false ? null : new Date(now + 7200 * 1000),
      familyId: overrides.familyId,
    });
  }

  describe('tenants', () => {
    it('should apply defaults', () => {
      expect(tenant).toMatchObject({ plan: 'free', maxUsers: 10, active: true, settings: {}, domain: null });
    });

    it('should reject duplicate slugs and domains', async () => {
      await storage.tenants.create({ name: 'Beta', slug: 'beta', domain: 'auth.beta.test' });

      await expect(storage.tenants.create({ name: 'Again', slug: 'acme' })).rejects.toBeInstanceOf(ConflictError);
      await expect(
        storage.tenants.create({ name: 'Gamma', slug: 'gamma', domain: 'auth.beta.test' })
      ).rejects.toMatchObject({ target: 'tenant.domain' });
    });

    it('should list active tenants by name', async () => {
      await storage.tenants.create({ name: 'Zeta', slug: 'zeta' });
      const beta = await storage.tenants.create({ name: 'Beta', slug: 'beta' });
      await storage.tenants.update(beta.id, { active: false });

      const names = (await storage.tenants.listActive()).map((t) => t.name);
      expect(names).toEqual(['Acme', 'Zeta']);
    });
  });

  describe('users', () => {
    const input = { username: 'alice', email: 'alice@acme.test', passwordHash: 'hash' };

    it('should scope uniqueness to the tenant', async () => {
      const beta = await storage.tenants.create({ name: 'Beta', slug: 'beta' });
      await storage.users.create({ ...input, tenantId: tenant.id });

      await expect(storage.users.create({ ...input, tenantId: beta.id })).resolves.toMatchObject({
        tenantId: beta.id,
      });
      await expect(
        storage.users.create({ ...input, email: 'other@acme.test', tenantId: tenant.id })
      ).rejects.toMatchObject({ target: 'user.username' });
      await expect(
        storage.users.create({ ...input, username: 'other', tenantId: tenant.id })
      ).rejects.toMatchObject({ target: 'user.email' });
    });

    it('should not find users through another tenant', async () => {
      const beta = await storage.tenants.create({ name: 'Beta', slug: 'beta' });
      const user = await storage.users.create({ ...input, tenantId: tenant.id });

      expect(await storage.users.findById(beta.id, user.id)).toBeNull();
      expect(await storage.users.findByUsername(beta.id, 'alice')).toBeNull();
      expect(await storage.users.updateRole(beta.id, user.id, 'owner')).toBeNull();
    });
  });

  describe('authorization codes', () => {
    async function createCode(expiresInMs = 60000) {
      return storage.authorizationCodes.create({
        tenantId: tenant.id,
        clientId: 'client-1',
        userId: 'user-1',
        redirectUri: 'http://localhost:3001/callback',
        scope: 'read',
        expiresAt: new Date(Date.now() + expiresInMs),
      });
    }

    it('should store only the hash', async () => {
      const { code, value } = await createCode();

      expect(code.codeHash).not.toBe(value);
      expect((await storage.authorizationCodes.findByValue(tenant.id, value))?.id).toBe(code.id);
    });

    it('should consume a code once', async () => {
      const { value } = await createCode();

      const [first, second] = await Promise.all([
        storage.authorizationCodes.consume(tenant.id, value),
        storage.authorizationCodes.consume(tenant.id, value),
      ]);

      expect(first?.usedAt).toBeInstanceOf(Date);
      expect(second).toBeNull();
    });

    it('should not consume an expired code', async () => {
      const { value } = await createCode(-1000);

      expect(await storage.authorizationCodes.consume(tenant.id, value)).toBeNull();
    });

    it('should not find a code through another tenant', async () => {
      const { value } = await createCode();

      expect(await storage.authorizationCodes.findByValue('other-tenant', value)).toBeNull();
    });
  });

  describe('tokens', () => {
    it('should omit the refresh token when not requested', async () => {
      const issued = await createToken({ withRefresh: false });

      expect(issued.refreshToken).toBeUndefined();
      expect(issued.token.refreshTokenHash).toBeNull();
    });

    it('should revoke only the access token', async () => {
      const { token, refreshToken } = await createToken();

      await storage.tokens.revokeAccess(tenant.id, token.id);

      const stored = await storage.tokens.findByRefreshToken(tenant.id, refreshToken ?? '');
      expect(stored?.accessRevokedAt).toBeInstanceOf(Date);
      expect(stored?.refreshRevokedAt).toBeNull();
    });

    it('should revoke both halves with the refresh token', async () => {
      const { token, accessToken } = await createToken();

      await storage.tokens.revokeRefresh(tenant.id, token.id);

      const stored = await storage.tokens.findByAccessToken(tenant.id, accessToken);
      expect(stored?.accessRevokedAt).toBeInstanceOf(Date);
      expect(stored?.refreshRevokedAt).toBeInstanceOf(Date);
    });

    it('should rotate a refresh token once', async () => {
      const { token } = await createToken();

      const [first, second] = await Promise.all([
        storage.tokens.rotate(tenant.id, token.id),
        storage.tokens.rotate(tenant.id, token.id),
      ]);

      expect(first?.refreshRevokedAt).toBeInstanceOf(Date);
      expect(second).toBeNull();
    });

    it('should revoke a whole family', async () => {
      const parent = await createToken();
      const child = await createToken({ familyId: parent.token.familyId });
      const stranger = await createToken();

      const count = await storage.tokens.revokeFamily(tenant.id, parent.token.familyId);

      expect(count).toBe(2);
      expect((await storage.tokens.findByAccessToken(tenant.id, child.accessToken))?.refreshRevokedAt).toBeInstanceOf(
        Date
      );
      expect((await storage.tokens.findByAccessToken(tenant.id, stranger.accessToken))?.accessRevokedAt).toBeNull();
    });

    it('should count active access tokens', async () => {
      const { token } = await createToken();
      await createToken();
      await storage.tokens.revokeAccess(tenant.id, token.id);

      expect(await storage.tokens.countActive(tenant.id)).toBe(1);
    });
  });

  describe('transactions', () => {
    it('should roll back every store on failure', async () => {
      await expect(
        storage.transaction(async (tx) => {
          await tx.tenants.create({ name: 'Beta', slug: 'beta' });
          await tx.users.create({ tenantId: tenant.id, username: 'bob', email: 'bob@acme.test', passwordHash: 'hash' });
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await storage.tenants.findBySlug('beta')).toBeNull();
      expect(await storage.users.findByUsername(tenant.id, 'bob')).toBeNull();
    });

    it('should keep the writes of a successful transaction', async () => {
      const created = await storage.transaction((tx) => tx.tenants.create({ name: 'Beta', slug: 'beta' }));

      expect((await storage.tenants.findBySlug('beta'))?.id).toBe(created.id);
    });

    it('should join nested transactions to the outer one', async () => {
      await expect(
        storage.transaction(async (tx) => {
          await tx.transaction((inner) => inner.tenants.create({ name: 'Beta', slug: 'beta' }));
          throw new Error('outer failed');
        })
      ).rejects.toThrow('outer failed');

      expect(await storage.tenants.findBySlug('beta')).toBeNull();
    });

    it('should run transactions one at a time', async () => {
      const order: string[] = [];

      await Promise.all([
        storage.transaction(async () => {
          order.push('first:start');
          await new Promise((resolve) => setTimeout(resolve, 10));
          order.push('first:end');
        }),
        storage.transaction(async () => {
          order.push('second:start');
        }),
      ]);

      expect(order).toEqual(['first:start', 'first:end', 'second:start']);
    });

    it('should keep writes made outside a failed transaction', async () => {
      const user = await storage.users.create({
        tenantId: tenant.id,
        username: 'bob',
        email: 'bob@acme.test',
        passwordHash: 'hash',
      });
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const failed = storage.transaction(async (tx) => {
        await tx.tenants.create({ name: 'Beta', slug: 'beta' });
        await gate;
        throw new Error('boom');
      });
      await new Promise((resolve) => setTimeout(resolve, 0));

      const issued = await createToken();
      await storage.users.updateRole(tenant.id, user.id, 'admin');
      release();
      await expect(failed).rejects.toThrow('boom');

      expect(await storage.tenants.findBySlug('beta')).toBeNull();
      expect((await storage.tokens.findByAccessToken(tenant.id, issued.accessToken))?.id).toBe(issued.token.id);
      expect((await storage.users.findById(tenant.id, user.id))?.role).toBe('admin');
    });

    it('should restore records a failed transaction overwrote', async () => {
      const { token, accessToken } = await createToken();

      await expect(
        storage.transaction(async (tx) => {
          await tx.tokens.revokeAccess(tenant.id, token.id);
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect((await storage.tokens.findByAccessToken(tenant.id, accessToken))?.accessRevokedAt).toBeNull();
    });

    it('should keep serving after a failed transaction', async () => {
      await expect(storage.transaction(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

      await expect(storage.transaction(async () => 'ok')).resolves.toBe('ok');
    });
  });
});
