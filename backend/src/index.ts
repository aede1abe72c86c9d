/**
 * backend/src/index.ts
 *
 * WHY:
 * - Single entrypoint for the backend process.
 * - Keeps startup logic small: load config -> build deps -> log readiness.
 * - No transport is started here; an HTTP layer mounts deps.auth.authService.
 */

import { buildConfig } from './app/config';
import { logger } from './shared/logger/logger';
import { buildDeps } from './app/di';

async function main(): Promise<void> {
  const config = buildConfig();
  const deps = await buildDeps(config);

  logger.info('app.ready', {
    env: config.nodeEnv,
    service: config.serviceName,
  });

  const shutdown = async (signal: string) => {
    logger.info('app.shutdown', { signal });
    await deps.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('app.fatal_startup_error', { err });
  process.exit(1);
});
