/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs in a flow share the same fields (flow name, store location).
 * - We don't want every call site repeating the same fields manually.
 *
 * HOW TO USE:
 * - `const log = withContext(logger, { flow: 'users.update' })`
 * - `log.info('users.update.success', { userId })`
 */

import type { Logger } from './logger';

export type LogMeta = Record<string, unknown>;

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withContext(logger: Logger, base: LogMeta): ContextLogger {
  return {
    info: (msg, meta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
