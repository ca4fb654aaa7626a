/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema (hand-declared, matches the migrations).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL code should accept.
 * Works for both the main DB and a transaction.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(opts: { databaseUrl: string; connectTimeoutMs: number }): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: opts.connectTimeoutMs,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
