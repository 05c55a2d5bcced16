/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably (dev + deploy step).
 * - Migrations are registered statically in ./migrations/index.ts, so this
 *   works the same from source (tsx) and from a build.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import { Migrator } from 'kysely';

import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({ databaseUrl: config.databaseUrl, poolMax: 1 });

  logger.info('migrations.found', { count: Object.keys(migrations).length });

  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: async () => migrations,
    },
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
