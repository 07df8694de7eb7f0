/**
 * backend/src/shared/db/migrations/0002_content.ts
 *
 * categories, tags, posts, comments and the post_tags join table.
 * Every content table carries the same audit columns as users.
 */

import type { CreateTableBuilder, Kysely } from 'kysely';

function withAuditColumns<TB extends string, C extends string>(table: CreateTableBuilder<TB, C>) {
  return table
    .addColumn('date_added', 'timestamptz', (col) => col.notNull())
    .addColumn('date_updated', 'timestamptz', (col) => col.notNull())
    .addColumn('added_by', 'uuid', (col) => col.references('users.id'))
    .addColumn('updated_by', 'uuid', (col) => col.references('users.id'))
    .addColumn('deleted_at', 'timestamptz');
}

export async function up(db: Kysely<unknown>): Promise<void> {
  await withAuditColumns(
    db.schema
      .createTable('categories')
      .addColumn('id', 'uuid', (col) => col.primaryKey())
      .addColumn('name', 'text', (col) => col.notNull().unique())
      .addColumn('slug', 'text', (col) => col.notNull().unique())
      .addColumn('description', 'text'),
  ).execute();

  await withAuditColumns(
    db.schema
      .createTable('tags')
      .addColumn('id', 'uuid', (col) => col.primaryKey())
      .addColumn('name', 'text', (col) => col.notNull().unique())
      .addColumn('slug', 'text', (col) => col.notNull().unique()),
  ).execute();

  await withAuditColumns(
    db.schema
      .createTable('posts')
      .addColumn('id', 'uuid', (col) => col.primaryKey())
      .addColumn('title', 'text', (col) => col.notNull())
      .addColumn('slug', 'text', (col) => col.notNull().unique())
      .addColumn('content', 'text', (col) => col.notNull())
      .addColumn('excerpt', 'text')
      .addColumn('author_id', 'uuid', (col) => col.notNull().references('users.id'))
      .addColumn('category_id', 'uuid', (col) => col.references('categories.id'))
      .addColumn('is_published', 'boolean', (col) => col.notNull().defaultTo(false))
      .addColumn('published_at', 'timestamptz')
      .addColumn('featured_image_url', 'text')
      .addColumn('view_count', 'integer', (col) => col.notNull().defaultTo(0)),
  ).execute();

  await withAuditColumns(
    db.schema
      .createTable('comments')
      .addColumn('id', 'uuid', (col) => col.primaryKey())
      .addColumn('content', 'text', (col) => col.notNull())
      .addColumn('post_id', 'uuid', (col) => col.notNull().references('posts.id'))
      .addColumn('author_id', 'uuid', (col) => col.notNull().references('users.id'))
      .addColumn('parent_comment_id', 'uuid', (col) => col.references('comments.id'))
      .addColumn('is_approved', 'boolean', (col) => col.notNull().defaultTo(false)),
  ).execute();

  await db.schema
    .createTable('post_tags')
    .addColumn('post_id', 'uuid', (col) => col.notNull().references('posts.id'))
    .addColumn('tag_id', 'uuid', (col) => col.notNull().references('tags.id'))
    .addColumn('date_added', 'timestamptz', (col) => col.notNull())
    .addColumn('added_by', 'uuid', (col) => col.references('users.id'))
    .addPrimaryKeyConstraint('post_tags_pkey', ['post_id', 'tag_id'])
    .execute();

  // Hot read paths: newest-first listings and per-author / per-post lookups.
  await db.schema.createIndex('posts_date_added_idx').on('posts').column('date_added').execute();
  await db.schema.createIndex('posts_author_id_idx').on('posts').column('author_id').execute();
  await db.schema.createIndex('posts_category_id_idx').on('posts').column('category_id').execute();
  await db.schema.createIndex('comments_post_id_idx').on('comments').column('post_id').execute();
  await db.schema.createIndex('post_tags_tag_id_idx').on('post_tags').column('tag_id').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('post_tags').ifExists().execute();
  await db.schema.dropTable('comments').ifExists().execute();
  await db.schema.dropTable('posts').ifExists().execute();
  await db.schema.dropTable('tags').ifExists().execute();
  await db.schema.dropTable('categories').ifExists().execute();
}
