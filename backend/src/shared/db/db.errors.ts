/**
 * backend/src/shared/db/db.errors.ts
 *
 * WHY:
 * - Store initialization has its own failure semantics.
 * - Keeps shared/errors/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put the raw location in meta (a Postgres URL can carry a password).
 */

import { AppError, type AppErrorMeta } from '../errors/errors';

export const DbErrors = {
  initializationFailed(meta?: AppErrorMeta, cause?: unknown) {
    return AppError.initializationFailed('Storage could not be opened or prepared.', {
      meta,
      cause,
    });
  },
} as const;
