/**
 * backend/src/modules/users/dal/inmem-user-repository.ts
 *
 * WHY:
 * - Lets service tests run without a database.
 * - Same contract as SqlUserRepository, including the no-op update/delete.
 *
 * HOW TO USE:
 * - const repo = new InMemUserRepository()
 */

import { UserErrors } from '../user.errors';
import type { NewUser, User, UserId } from '../user.types';
import type { UserRepository } from './user-repository';

export class InMemUserRepository implements UserRepository {
  private readonly rows = new Map<UserId, User>();
  private lastId = 0;

  getById(id: UserId): Promise<User> {
    const row = this.rows.get(id);
    if (!row) return Promise.reject(UserErrors.userNotFound({ userId: id }));
    return Promise.resolve({ ...row });
  }

  getAll(): Promise<User[]> {
    return Promise.resolve(Array.from(this.rows.values(), (row) => ({ ...row })));
  }

  save(user: NewUser): Promise<User> {
    // ids are never reused, even after delete
    this.lastId += 1;
    const row: User = { id: this.lastId, name: user.name, email: user.email };
    this.rows.set(row.id, row);
    return Promise.resolve({ ...row });
  }

  update(user: User): Promise<void> {
    if (this.rows.has(user.id)) {
      this.rows.set(user.id, { id: user.id, name: user.name, email: user.email });
    }
    return Promise.resolve();
  }

  delete(id: UserId): Promise<void> {
    this.rows.delete(id);
    return Promise.resolve();
  }
}
