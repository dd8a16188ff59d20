import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core';
import { authorizationCodes, tokens } from '../../storage/drizzle/schema.js';

const schemaSql = readFileSync(new URL('../../../sql/schema.sql', import.meta.url), 'utf-8');

function foreignKeys(table: PgTable) {
  return getTableConfig(table).foreignKeys.map((fk) => {
    const reference = fk.reference();
    return {
      name: fk.getName(),
      columns: reference.columns.map((column) => column.name),
      foreignTable: getTableConfig(reference.foreignTable).name,
      foreignColumns: reference.foreignColumns.map((column) => column.name),
    };
  });
}

describe('Postgres schema', () => {
  it.each([
    ['authorization_codes', authorizationCodes],
    ['oauth_tokens', tokens],
  ])('should tie %s to clients and users of the same tenant', (name, table) => {
    const keys = foreignKeys(table);

    expect(keys).toContainEqual({
      name: `${name}_client_fk`,
      columns: ['tenant_id', 'client_id'],
      foreignTable: 'oauth_clients',
      foreignColumns: ['tenant_id', 'client_id'],
    });
    expect(keys).toContainEqual({
      name: `${name}_user_fk`,
      columns: ['tenant_id', 'user_id'],
      foreignTable: 'users',
      foreignColumns: ['tenant_id', 'id'],
    });
  });

  it('should declare the same client keys in the bootstrap SQL', () => {
    for (const name of ['authorization_codes', 'oauth_tokens']) {
      expect(schemaSql).toContain(
        `CONSTRAINT ${name}_client_fk FOREIGN KEY (tenant_id, client_id) REFERENCES oauth_clients (tenant_id, client_id)`
      );
    }
    expect(schemaSql).toContain('CONSTRAINT oauth_clients_tenant_client_unique UNIQUE (tenant_id, client_id)');
  });
});
