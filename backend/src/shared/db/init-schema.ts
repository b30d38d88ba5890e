/**
 * backend/src/shared/db/init-schema.ts
 *
 * WHY:
 * - The store creates its only table on open; there is no migration history.
 * - CREATE TABLE IF NOT EXISTS makes this safe to run on every start.
 *
 * RULES:
 * - Additive only. Never drop or alter an existing table here.
 * - Ids must never be reused: SQLite needs AUTOINCREMENT for that,
 *   Postgres gets it from the serial sequence.
 */

import type { DbDialect, DbExecutor } from './db';

export async function ensureUsersTable(db: DbExecutor, dialect: DbDialect): Promise<void> {
  const base = db.schema.createTable('users').ifNotExists();

  const withId =
    dialect === 'postgres'
      ? base.addColumn('id', 'serial', (col) => col.primaryKey())
      : base.addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement());

  await withId.addColumn('name', 'text').addColumn('email', 'text').execute();
}
