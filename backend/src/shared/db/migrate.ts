/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and in deploy jobs.
 * - Migrations are registered statically in ./migrations/index.ts, so the
 *   provider needs no filesystem scanning and works from source or dist.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import { Migrator, type MigrationProvider } from 'kysely';

import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const provider: MigrationProvider = {
  getMigrations() {
    logger.info('db.migrations.found', { count: Object.keys(migrations).length });
    return Promise.resolve(migrations);
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({ db, provider });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrations.failed', { err: error });
    process.exitCode = 1;
    return;
  }

  logger.info('db.migrations.up_to_date');
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migrations.crashed', { err });
  process.exitCode = 1;
});
