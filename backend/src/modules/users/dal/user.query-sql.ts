/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 * - Returns rows as stored; shaping into User happens in the repository.
 *
 * RULES:
 * - No AppError.
 * - One statement per function.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Users } from '../../../shared/db/schema.types';

export type UserRow = Selectable<Users>;

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .select(['id', 'name', 'email'])
    .where('id', '=', userId)
    .executeTakeFirst();
}

/**
 * No ORDER BY: row order is whatever the backend returns.
 */
export async function selectAllUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('users').select(['id', 'name', 'email']).execute();
}
