/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably from the CLI (`npm run db:migrate`).
 * - Migrations are listed statically in ./migrations/index.ts, so the same
 *   runner works for Postgres and for the in-memory SQLite used in tests.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace @blog-platform/backend
 * - Tests call migrateToLatest(db) directly.
 */

import { Migrator } from 'kysely';
import type { Kysely } from 'kysely';

import { migrationProvider } from './migrations';
import { logger } from '../logger/logger';

export async function migrateToLatest<T>(db: Kysely<T>): Promise<void> {
  const migrator = new Migrator({ db, provider: migrationProvider });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  if (error) throw error;
}
