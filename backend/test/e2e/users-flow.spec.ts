import { describe, it, expect } from 'vitest';
import { buildTestDeps } from '../helpers/build-test-deps';

describe('users flow (service over SQLite)', () => {
  it('create, get, list, update, delete', async () => {
    const { deps, close } = await buildTestDeps();
    try {
      const { userService } = deps.users;

      await userService.createUser('John Doe', 'john@example.com');

      expect(await userService.getUser(1)).toEqual({
        id: 1,
        name: 'John Doe',
        email: 'john@example.com',
      });
      expect(await userService.getAllUsers()).toEqual([
        { id: 1, name: 'John Doe', email: 'john@example.com' },
      ]);

      await userService.updateUser(1, 'John Smith', 'john.smith@example.com');
      expect(await userService.getUser(1)).toEqual({
        id: 1,
        name: 'John Smith',
        email: 'john.smith@example.com',
      });

      await userService.deleteUser(1);
      await expect(userService.getUser(1)).rejects.toMatchObject({ code: 'NOT_FOUND' });
      expect(await userService.getAllUsers()).toEqual([]);
    } finally {
      await close();
    }
  });

  it('updateUser on a missing id fails while the raw repository update does not', async () => {
    const { deps, close } = await buildTestDeps();
    try {
      const { userService, userRepo } = deps.users;

      await expect(
        userRepo.update({ id: 1, name: 'Ghost', email: 'ghost@example.com' }),
      ).resolves.toBeUndefined();
      await expect(
        userService.updateUser(1, 'Ghost', 'ghost@example.com'),
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
    } finally {
      await close();
    }
  });

  it('deleteUser on a missing id leaves the table unchanged', async () => {
    const { deps, close } = await buildTestDeps();
    try {
      const { userService } = deps.users;
      await userService.createUser('Jane Roe', 'jane@example.com');

      await userService.deleteUser(2);

      expect(await userService.getAllUsers()).toEqual([
        { id: 1, name: 'Jane Roe', email: 'jane@example.com' },
      ]);
    } finally {
      await close();
    }
  });

  it('buildDeps fails with INITIALIZATION_FAILED for an unopenable location', async () => {
    await expect(
      buildTestDeps({ databaseUrl: '/nonexistent-users-store-dir/nested/users.db' }),
    ).rejects.toMatchObject({ code: 'INITIALIZATION_FAILED' });
  });
});
