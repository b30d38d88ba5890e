/**
 * backend/src/index.ts
 *
 * WHY:
 * - Demonstration entrypoint: load config -> build deps -> run a fixed sequence of calls.
 * - Not a stable interface. Any error is fatal (exit 1).
 *
 * HOW TO USE:
 * - npm start (DATABASE_URL defaults to ./users.db)
 */

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { logger } from './shared/logger/logger';
import { serializeError } from './shared/logger/serialize-error';

async function main(): Promise<void> {
  const config = buildConfig();
  const deps = await buildDeps(config);
  const { userService } = deps.users;

  try {
    await userService.createUser('John Doe', 'john@example.com');

    const user = await userService.getUser(1);
    logger.info('demo.user', { user });

    const users = await userService.getAllUsers();
    for (const u of users) {
      logger.info('demo.users.item', { user: u });
    }

    await userService.updateUser(1, 'John Smith', 'john.smith@example.com');

    await userService.deleteUser(1);
  } finally {
    await deps.close();
  }

  logger.info('demo.done', { service: config.serviceName });
}

void main().catch((err: unknown) => {
  logger.error('demo.fatal_error', { err: serializeError(err) });
  process.exit(1);
});
