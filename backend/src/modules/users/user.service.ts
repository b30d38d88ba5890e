/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Use-case facade over UserRepository.
 * - Adds no business rules: every call maps to one or two repository calls.
 *
 * RULES:
 * - Errors from the repository propagate unchanged (no wrapping, no retry).
 * - No state beyond the injected deps.
 * - updateUser reads before it writes, so it is the only update path that
 *   fails on a missing id. The read and the write are not isolated.
 */

import type { Logger } from '../../shared/logger/logger';
import { withContext } from '../../shared/logger/with-context';
import type { UserRepository } from './dal/user-repository';
import type { User, UserId } from './user.types';

export class UserService {
  constructor(
    private readonly deps: {
      userRepo: UserRepository;
      logger: Logger;
    },
  ) {}

  async getUser(userId: UserId): Promise<User> {
    const log = withContext(this.deps.logger, { flow: 'users.get', userId });
    log.debug('users.get.start');

    return this.deps.userRepo.getById(userId);
  }

  async getAllUsers(): Promise<User[]> {
    const users = await this.deps.userRepo.getAll();

    this.deps.logger.debug('users.list.success', { flow: 'users.list', count: users.length });
    return users;
  }

  /**
   * Resolves without the created user; callers that need the id must look it up.
   */
  async createUser(name: string, email: string): Promise<void> {
    const created = await this.deps.userRepo.save({ name, email });

    this.deps.logger.info('users.create.success', { flow: 'users.create', userId: created.id });
  }

  async updateUser(userId: UserId, name: string, email: string): Promise<void> {
    const log = withContext(this.deps.logger, { flow: 'users.update', userId });

    // 1) Must exist (NOT_FOUND propagates)
    const user = await this.deps.userRepo.getById(userId);

    // 2) Overwrite the fetched copy and write it back
    await this.deps.userRepo.update({ ...user, name, email });

    log.info('users.update.success');
  }

  async deleteUser(userId: UserId): Promise<void> {
    await this.deps.userRepo.delete(userId);

    this.deps.logger.info('users.delete.success', { flow: 'users.delete', userId });
  }
}
