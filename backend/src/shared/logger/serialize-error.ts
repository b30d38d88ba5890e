/**
 * backend/src/shared/logger/serialize-error.ts
 *
 * WHY:
 * - winston's errors() format only expands an Error passed as the message itself.
 *   An Error nested in meta (`{ err }`) serializes to `{}` in JSON output.
 *
 * HOW TO USE:
 * - `logger.error('db.init_failed', { err: serializeError(err) })`
 * - Follows `cause` so the driver error under an AppError is kept.
 */

export function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;

  const out: Record<string, unknown> = {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };

  if ('code' in err) out.code = err.code;
  if ('meta' in err) out.meta = err.meta;
  if (err.cause !== undefined) out.cause = serializeError(err.cause);

  return out;
}
