/**
 * backend/src/modules/users/dal/user-repository.ts
 *
 * WHY:
 * - The service depends on this abstraction, never on a storage technology.
 * - One implementation per backend: SqlUserRepository (Kysely), InMemUserRepository (tests).
 *
 * CONTRACT:
 * - getById rejects with NOT_FOUND when no row matches.
 * - getAll resolves [] on an empty table.
 * - save ignores any caller id and resolves the persisted user; the input is not mutated.
 * - update/delete on a missing id are silent no-ops.
 * - Storage failures on save/update/delete reject with WRITE_FAILED.
 */

import type { NewUser, User, UserId } from '../user.types';

export interface UserRepository {
  getById(id: UserId): Promise<User>;
  getAll(): Promise<User[]>;
  save(user: NewUser): Promise<User>;
  update(user: User): Promise<void>;
  delete(id: UserId): Promise<void>;
}
