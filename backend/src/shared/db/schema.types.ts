/**
 * backend/src/shared/db/schema.types.ts
 *
 * WHY:
 * - Kysely table interfaces for the store.
 * - The store owns exactly one table; its shape is created by init-schema.ts.
 *
 * RULES:
 * - Keep aligned with init-schema.ts (column names + nullability).
 * - snake_case stays here and in DAL; domain types live in modules.
 */

import type { Generated } from 'kysely';

export interface Users {
  id: Generated<number>;
  name: string | null;
  email: string | null;
}

export interface DB {
  users: Users;
}
