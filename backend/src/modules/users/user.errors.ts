/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/errors/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Only the repository layer creates these; service rethrows unchanged.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  writeFailed(meta?: AppErrorMeta, cause?: unknown) {
    return AppError.writeFailed('User write failed', { meta, cause });
  },
} as const;
