/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) for log querying.
 *
 * HOW TO USE:
 * - buildDeps() applies config.logLevel; until then LOG_LEVEL (or 'info') applies.
 * - Services receive `logger` through their deps (di.ts passes this instance).
 * - Prefer `withContext({ requestId, identityId })` when logging inside a flow.
 * - Do not log raw Error objects only; pass `{ err }` so stack/message is preserved.
 * - Never log raw tokens, codes, TOTP secrets or passwords.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'authcore-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console({ silent: nodeEnv === 'test' })],
});

export type Logger = winston.Logger;

export function setLogLevel(next: string): void {
  logger.level = next;
}
