/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent coupling via deep imports into /dal.
 *
 * RULES:
 * - Export the service, the repository contract and its implementations.
 * - Keep exports minimal; add more only when explicitly required.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { UserService } from './user.service';
export { UserErrors } from './user.errors';
export type { UserRepository } from './dal/user-repository';
export { SqlUserRepository } from './dal/sql-user-repository';
export { InMemUserRepository } from './dal/inmem-user-repository';
export type { NewUser, User, UserId } from './user.types';
