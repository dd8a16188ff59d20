import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Database handle accepted by repositories; transactions satisfy it too
 */
export type Database = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export interface DatabaseConnection {
  db: Database;
  close(): Promise<void>;
}

/**
 * Open a postgres connection pool and wrap it with drizzle
 */
export function connectDatabase(connectionString: string, options?: { maxConnections?: number }): DatabaseConnection {
  const client = postgres(connectionString, { max: options?.maxConnections ?? 10 });

  return {
    db: drizzle(client, { schema }),
    close: () => client.end(),
  };
}
