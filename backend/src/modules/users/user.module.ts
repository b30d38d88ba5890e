/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - The SQL repository is the only production backend; tests swap in
 *   InMemUserRepository by building UserService directly.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { SqlUserRepository } from './dal/sql-user-repository';
import type { UserRepository } from './dal/user-repository';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor; logger: Logger }) {
  const userRepo: UserRepository = new SqlUserRepository(deps.db);
  const userService = new UserService({ userRepo, logger: deps.logger });

  return {
    userRepo,
    userService,
  };
}
