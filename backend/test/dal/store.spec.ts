import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Kysely } from 'kysely';

import { openStore } from '../../src/shared/db/store';
import { SqlUserRepository } from '../../src/modules/users/dal/sql-user-repository';
import { isAppError } from '../../src/shared/errors/errors';
import { createSilentLogger } from '../helpers/build-test-deps';

describe('store initialization', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'users-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the users table in a new file', async () => {
    const store = await openStore(path.join(dir, 'users.db'), { logger: createSilentLogger() });
    try {
      expect(store.dialect).toBe('sqlite');
      expect(await new SqlUserRepository(store.db).getAll()).toEqual([]);
    } finally {
      await store.close();
    }
  });

  it('is idempotent: reopening keeps existing rows and the id sequence', async () => {
    const location = path.join(dir, 'users.db');
    const logger = createSilentLogger();

    const first = await openStore(location, { logger });
    try {
      await new SqlUserRepository(first.db).save({ name: 'Quinn', email: 'quinn@example.com' });
    } finally {
      await first.close();
    }

    const second = await openStore(location, { logger });
    try {
      const repo = new SqlUserRepository(second.db);
      expect(await repo.getAll()).toEqual([{ id: 1, name: 'Quinn', email: 'quinn@example.com' }]);

      const next = await repo.save({ name: 'Rupert', email: 'rupert@example.com' });
      expect(next.id).toBe(2);
    } finally {
      await second.close();
    }
  });

  it('fails with INITIALIZATION_FAILED when the location cannot be opened', async () => {
    const location = path.join(dir, 'missing-dir', 'users.db');

    const err = await openStore(location, { logger: createSilentLogger() }).catch(
      (e: unknown) => e,
    );

    expect(isAppError(err, 'INITIALIZATION_FAILED')).toBe(true);
    expect(err).toMatchObject({ meta: { stage: 'open', dialect: 'sqlite' } });
    expect(err).toHaveProperty('cause');
  });

  it('fails with INITIALIZATION_FAILED when the schema cannot be created', async () => {
    const location = path.join(dir, 'not-a-database.db');
    writeFileSync(location, 'plain text, not a sqlite file\n'.repeat(64));

    const err = await openStore(location, { logger: createSilentLogger() }).catch(
      (e: unknown) => e,
    );

    expect(isAppError(err, 'INITIALIZATION_FAILED')).toBe(true);
    expect(err).toMatchObject({ meta: { stage: 'schema', dialect: 'sqlite' } });
  });

  it('keeps the schema error when closing the half-opened handle also fails', async () => {
    const location = path.join(dir, 'not-a-database.db');
    writeFileSync(location, 'plain text, not a sqlite file\n'.repeat(64));

    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');
    vi.spyOn(Kysely.prototype, 'destroy').mockRejectedValue(new Error('close failed'));

    await expect(openStore(location, { logger })).rejects.toMatchObject({
      code: 'INITIALIZATION_FAILED',
      meta: { stage: 'schema' },
    });
    expect(warn).toHaveBeenCalledWith(
      'db.close_failed',
      expect.objectContaining({ err: expect.objectContaining({ message: 'close failed' }) }),
    );
  });
});
