/**
 * backend/src/shared/db/store.ts
 *
 * WHY:
 * - Single initialization contract for the backend:
 *   open (or create) the location, then make sure the schema exists.
 * - Any failure on the way surfaces as INITIALIZATION_FAILED with the driver error as cause.
 *
 * RULES:
 * - Called once by the composition root (di.ts). The handle is process-wide.
 * - A half-opened handle is destroyed before the error is thrown.
 * - A failure while destroying it never replaces the initialization error.
 */

import type { Logger } from '../logger/logger';
import { serializeError } from '../logger/serialize-error';
import { createDb, resolveDialect } from './db';
import type { Db, DbDialect } from './db';
import { DbErrors } from './db.errors';
import { ensureUsersTable } from './init-schema';

export type Store = {
  db: Db;
  dialect: DbDialect;
  close: () => Promise<void>;
};

function openDb(location: string, dialect: DbDialect, logger: Logger): Db {
  try {
    return createDb(location);
  } catch (err: unknown) {
    logger.error('db.init_failed', { stage: 'open', dialect, err: serializeError(err) });
    throw DbErrors.initializationFailed({ stage: 'open', dialect }, err);
  }
}

export async function openStore(location: string, deps: { logger: Logger }): Promise<Store> {
  const dialect = resolveDialect(location);
  const db = openDb(location, dialect, deps.logger);

  try {
    await ensureUsersTable(db, dialect);
  } catch (err: unknown) {
    deps.logger.error('db.init_failed', { stage: 'schema', dialect, err: serializeError(err) });

    // The schema error is the one callers see; a failing close is only logged.
    await db.destroy().catch((closeErr: unknown) => {
      deps.logger.warn('db.close_failed', { dialect, err: serializeError(closeErr) });
    });
    throw DbErrors.initializationFailed({ stage: 'schema', dialect }, err);
  }

  deps.logger.info('db.opened', { dialect });

  return {
    db,
    dialect,
    close: () => db.destroy(),
  };
}
