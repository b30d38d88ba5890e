/**
 * backend/src/modules/users/dal/sql-user-repository.ts
 *
 * WHY:
 * - UserRepository over Kysely (SQLite or Postgres, chosen by the store).
 * - Each operation runs exactly one statement.
 *
 * RULES:
 * - No transactions started here.
 * - Write failures are reported as WRITE_FAILED with the driver error as cause.
 * - update/delete do not check that the row exists.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { UserErrors } from '../user.errors';
import type { NewUser, User, UserId } from '../user.types';
import type { UserRepository } from './user-repository';
import { selectAllUsersSql, selectUserByIdSql } from './user.query-sql';
import type { UserRow } from './user.query-sql';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name ?? null,
    email: row.email ?? null,
  };
}

export class SqlUserRepository implements UserRepository {
  constructor(private readonly db: DbExecutor) {}

  async getById(id: UserId): Promise<User> {
    const row = await selectUserByIdSql(this.db, id);
    if (!row) throw UserErrors.userNotFound({ userId: id });
    return toUser(row);
  }

  async getAll(): Promise<User[]> {
    const rows = await selectAllUsersSql(this.db);
    return rows.map(toUser);
  }

  /**
   * Inserts name/email only; the id comes back from the backend via RETURNING.
   */
  async save(user: NewUser): Promise<User> {
    try {
      const row = await this.db
        .insertInto('users')
        .values({
          name: user.name,
          email: user.email,
        })
        .returning(['id', 'name', 'email'])
        .executeTakeFirstOrThrow();

      return toUser(row);
    } catch (err: unknown) {
      throw UserErrors.writeFailed({ op: 'save' }, err);
    }
  }

  async update(user: User): Promise<void> {
    try {
      await this.db
        .updateTable('users')
        .set({
          name: user.name,
          email: user.email,
        })
        .where('id', '=', user.id)
        .executeTakeFirst();
    } catch (err: unknown) {
      throw UserErrors.writeFailed({ op: 'update', userId: user.id }, err);
    }
  }

  async delete(id: UserId): Promise<void> {
    try {
      await this.db.deleteFrom('users').where('id', '=', id).executeTakeFirst();
    } catch (err: unknown) {
      throw UserErrors.writeFailed({ op: 'delete', userId: id }, err);
    }
  }
}
