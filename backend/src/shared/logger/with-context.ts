/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should carry requestId + identityId so a full flow can be traced.
 * - We don't want every flow repeating the same fields manually.
 *
 * HOW TO USE:
 * - `withContext(logger, { requestId, identityId }).info('auth.login.success', { flow: 'auth.login' })`
 * - The transport layer (out of scope) owns requestId generation and passes it down.
 */

import type { Logger } from './logger';

type LogMeta = Record<string, unknown>;

export type LogContext = {
  requestId?: string | null;
  identityId?: number | null;
};

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withContext(logger: Logger, ctx: LogContext): ContextLogger {
  const base = {
    requestId: ctx.requestId ?? null,
    identityId: ctx.identityId ?? null,
  };

  return {
    info: (msg, meta = {}) => void logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => void logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => void logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => void logger.debug(msg, { ...base, ...meta }),
  };
}
