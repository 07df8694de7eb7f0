/**
 * backend/src/shared/db/migrations/0001_users.ts
 *
 * users: global identity plus credentials.
 * - email is stored lowercase by the application.
 * - password_version increments on every password change; reset tokens embed it.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('username', 'text', (col) => col.notNull().unique())
    .addColumn('full_name', 'text')
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('is_verified', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('bio', 'text')
    .addColumn('profile_image_url', 'text')
    .addColumn('password_version', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('date_added', 'timestamptz', (col) => col.notNull())
    .addColumn('date_updated', 'timestamptz', (col) => col.notNull())
    .addColumn('added_by', 'uuid')
    .addColumn('updated_by', 'uuid')
    .addColumn('deleted_at', 'timestamptz')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
