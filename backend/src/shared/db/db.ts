/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - The storage location picks the dialect:
 *     postgres://... | postgresql://...  -> pg pool (PostgresDialect)
 *     anything else (file path, :memory:) -> better-sqlite3 (SqliteDialect)
 *
 * HOW TO USE:
 * - Modules never call createDb(); the composition root opens the store
 *   (see store.ts) and passes `db` down.
 */

import pg from 'pg';
import SQLite from 'better-sqlite3';
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';

import type { DB } from './schema.types';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export type DbDialect = 'sqlite' | 'postgres';

const POSTGRES_URL = /^postgres(ql)?:\/\//i;

export function resolveDialect(location: string): DbDialect {
  return POSTGRES_URL.test(location) ? 'postgres' : 'sqlite';
}

export function createDb(location: string): Db {
  if (resolveDialect(location) === 'postgres') {
    const pool = new pg.Pool({
      connectionString: location,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 10_000,
    });

    return new Kysely<DB>({
      dialect: new PostgresDialect({ pool }),
    });
  }

  // Opened eagerly: an unopenable path throws here, not on first query.
  // better-sqlite3 is a single connection; Kysely's SqliteDriver serializes statements on it.
  return new Kysely<DB>({
    dialect: new SqliteDialect({ database: new SQLite(location) }),
  });
}
