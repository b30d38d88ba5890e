/**
 * backend/src/shared/errors/errors.ts
 *
 * WHY:
 * - Central error primitive used across repositories/services.
 * - Callers branch on `code`, never on message text.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 */

export const APP_ERROR_CODES = [
  'NOT_FOUND',
  'WRITE_FAILED',
  'INITIALIZATION_FAILED',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', message, meta });
  }

  static writeFailed(message = 'Write failed', opts: { meta?: AppErrorMeta; cause?: unknown } = {}) {
    return new AppError({ code: 'WRITE_FAILED', message, ...opts });
  }

  static initializationFailed(
    message = 'Initialization failed',
    opts: { meta?: AppErrorMeta; cause?: unknown } = {},
  ) {
    return new AppError({ code: 'INITIALIZATION_FAILED', message, ...opts });
  }
}

export function isAppError(err: unknown, code?: AppErrorCode): err is AppError {
  if (!(err instanceof AppError)) return false;
  return code === undefined || err.code === code;
}
