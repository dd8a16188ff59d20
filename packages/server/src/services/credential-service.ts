import type { GrantType } from '@tenant-oauth/shared';
import type { Tenant } from '../types/tenant.js';
import type { User, UserRole } from '../types/user.js';
import type { OAuthClient, ClientAuthMethod } from '../types/client.js';
import type { IStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { ConflictError } from '../errors/storage-error.js';
import { hashSecret, verifySecret, dummySecretHash } from '../crypto/hash.js';
import { grantsPermittedFor } from './client-policy.js';

export interface RegisterUserInput {
  username: string;
  email: string;
  password: string;
  role?: UserRole;
}

export interface RegisterClientInput {
  name: string;
  redirectUris: string[];
  grantTypes: GrantType[];
  scopes: string[];
  authMethod: ClientAuthMethod;
}

/**
 * Users and OAuth clients of a tenant
 */
export class CredentialService {
  constructor(private readonly storage: IStorage) {}

  /**
   * Register a user, enforcing the tenant's user limit
   */
  async registerUser(tenant: Tenant, input: RegisterUserInput): Promise<User> {
    const passwordHash = await hashSecret(input.password);

    return this.storage.transaction(async (tx) => {
      const activeUsers = await tx.users.countByTenant(tenant.id, { activeOnly: true });
      if (activeUsers >= tenant.maxUsers) {
        throw OAuthError.userLimitReached(`User limit reached (${tenant.maxUsers} users)`);
      }

      try {
        return await tx.users.create({
          tenantId: tenant.id,
          username: input.username,
          email: input.email,
          passwordHash,
          role: input.role ?? 'user',
        });
      } catch (error) {
        if (error instanceof ConflictError) {
          throw OAuthError.duplicateUser();
        }
        throw error;
      }
    });
  }

  /**
   * Authenticate a user within one tenant
   *
   * Unknown users, wrong passwords and inactive accounts fail identically.
   */
  async authenticate(tenantId: string, username: string, password: string): Promise<User> {
    const user = await this.storage.users.findByUsername(tenantId, username);

    if (!user) {
      await verifySecret(password, await dummySecretHash());
      throw OAuthError.authFailed();
    }

    const valid = await verifySecret(password, user.passwordHash);
    if (!valid || !user.active) {
      throw OAuthError.authFailed();
    }

    return user;
  }

  /**
   * Register an OAuth client owned by a user
   *
   * The plaintext secret is returned once; only its hash is stored.
   */
  async registerClient(
    tenant: Tenant,
    owner: User,
    input: RegisterClientInput
  ): Promise<{ client: OAuthClient; clientSecret?: string }> {
    if (owner.tenantId !== tenant.id) {
      throw OAuthError.accessDenied('User does not belong to this tenant');
    }

    const permitted = grantsPermittedFor(input.authMethod);
    const forbidden = permitted ? input.grantTypes.filter((grant) => !permitted.includes(grant)) : [];
    if (forbidden.length > 0) {
      throw OAuthError.invalidRequest(
        `Public clients cannot use grant types: ${forbidden.join(', ')}`
      );
    }

    return this.storage.clients.create({
      tenantId: tenant.id,
      ownerUserId: owner.id,
      name: input.name,
      authMethod: input.authMethod,
      redirectUris: input.redirectUris,
      allowedGrants: input.grantTypes,
      allowedScopes: input.scopes,
    });
  }
}
