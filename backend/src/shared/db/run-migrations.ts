/**
 * backend/src/shared/db/run-migrations.ts
 *
 * CLI entry for `npm run db:migrate`.
 */

import { createDb } from './db';
import { migrateToLatest } from './migrate';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations() {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  try {
    await migrateToLatest(db);
    logger.info('Migrations up to date');
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('Migration failed', {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
