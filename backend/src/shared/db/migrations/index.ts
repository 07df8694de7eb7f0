/**
 * backend/src/shared/db/migrations/index.ts
 *
 * Static migration list. Add new migrations here in order; the key is the
 * migration name recorded in kysely_migration.
 */

import type { Migration, MigrationProvider } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_content';

const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_content': m0002,
};

export const migrationProvider: MigrationProvider = {
  getMigrations: () => Promise.resolve(migrations),
};
