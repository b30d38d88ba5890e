/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Opens the store ONCE and shares the handle with every module.
 * - Keeps modules testable (tests build the service over InMemUserRepository).
 *
 * RULES:
 * - No business logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { openStore } from '../shared/db/store';
import type { Db } from '../shared/db/db';

import { logger as defaultLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users';
import type { UserModule } from '../modules/users';

export type AppDeps = {
  db: Db;
  logger: Logger;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(
  config: AppConfig,
  opts: { logger?: Logger } = {},
): Promise<AppDeps> {
  const logger = opts.logger ?? defaultLogger;
  logger.level = config.logLevel;
  logger.defaultMeta = {
    ...logger.defaultMeta,
    service: config.serviceName,
    env: config.nodeEnv,
  };

  // Fails with INITIALIZATION_FAILED; nothing else is built if the store can't open.
  const store = await openStore(config.databaseUrl, { logger });

  const users = createUserModule({ db: store.db, logger });

  return {
    db: store.db,
    logger,
    users,
    close: store.close,
  };
}
