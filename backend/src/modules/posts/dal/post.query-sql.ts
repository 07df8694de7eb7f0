/**
 * backend/src/modules/posts/dal/post.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for posts and their tag links.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 * - Soft-deleted posts and tags are never returned.
 * - Listings are newest first (date_added desc, id as tie-breaker).
 */

import { sql } from 'kysely';
import type { Selectable, SqlBool } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { PostsTable, TagsTable } from '../../../shared/db/schema';
import type { PostListFilters } from '../post.types';

export type PostRow = Selectable<PostsTable>;

export type PostTagRow = Selectable<TagsTable> & { post_id: string };

/** Escapes LIKE wildcards so the term matches literally. */
export function toContainsPattern(term: string): string {
  return `%${term.toLowerCase().replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

function containsIgnoreCase(column: 'title' | 'content' | 'excerpt', pattern: string) {
  return sql<SqlBool>`lower(${sql.ref(column)}) like ${pattern} escape '\\'`;
}

export async function selectPostByIdSql(
  db: DbExecutor,
  postId: string,
): Promise<PostRow | undefined> {
  return db
    .selectFrom('posts')
    .selectAll()
    .where('id', '=', postId)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectPostBySlugSql(
  db: DbExecutor,
  slug: string,
): Promise<PostRow | undefined> {
  return db
    .selectFrom('posts')
    .selectAll()
    .where('slug', '=', slug)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectPostsSql(
  db: DbExecutor,
  filters: PostListFilters,
  page: { skip: number; limit: number },
): Promise<PostRow[]> {
  let query = db.selectFrom('posts').selectAll().where('deleted_at', 'is', null);

  if (filters.publishedOnly) query = query.where('is_published', '=', true);
  if (filters.authorId) query = query.where('author_id', '=', filters.authorId);

  // A soft-deleted category or tag matches nothing.
  if (filters.categoryId) {
    query = query.where(
      'category_id',
      'in',
      db
        .selectFrom('categories')
        .select('id')
        .where('id', '=', filters.categoryId)
        .where('deleted_at', 'is', null),
    );
  }

  if (filters.tagId) {
    query = query.where(
      'id',
      'in',
      db
        .selectFrom('post_tags')
        .innerJoin('tags', 'tags.id', 'post_tags.tag_id')
        .select('post_tags.post_id')
        .where('post_tags.tag_id', '=', filters.tagId)
        .where('tags.deleted_at', 'is', null),
    );
  }

  if (filters.search) {
    const pattern = toContainsPattern(filters.search);
    query = query.where((eb) =>
      eb.or([
        containsIgnoreCase('title', pattern),
        containsIgnoreCase('content', pattern),
        containsIgnoreCase('excerpt', pattern),
      ]),
    );
  }

  return query
    .orderBy('date_added', 'desc')
    .orderBy('id')
    .offset(page.skip)
    .limit(page.limit)
    .execute();
}

/** Probes every row, deleted or not: the unique constraint covers them all. */
export async function isPostSlugTakenSql(
  db: DbExecutor,
  slug: string,
  excludeId?: string,
): Promise<boolean> {
  let query = db.selectFrom('posts').select('id').where('slug', '=', slug);
  if (excludeId !== undefined) query = query.where('id', '!=', excludeId);

  const row = await query.executeTakeFirst();
  return row !== undefined;
}

export async function selectActiveTagsForPostsSql(
  db: DbExecutor,
  postIds: readonly string[],
): Promise<PostTagRow[]> {
  if (postIds.length === 0) return [];

  return db
    .selectFrom('post_tags')
    .innerJoin('tags', 'tags.id', 'post_tags.tag_id')
    .selectAll('tags')
    .select('post_tags.post_id')
    .where('post_tags.post_id', 'in', [...postIds])
    .where('tags.deleted_at', 'is', null)
    .orderBy('tags.name')
    .execute();
}
