/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Storage assigns `id` on insert; it never changes afterwards.
 *
 * RULES:
 * - Keep aligned with DB schema (name/email columns are nullable).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type UserId = number;

export type User = {
  id: UserId;
  name: string | null;
  email: string | null;
};

/**
 * A user not yet persisted. Any `id` present is ignored on save.
 */
export type NewUser = Omit<User, 'id'> & { id?: UserId };
