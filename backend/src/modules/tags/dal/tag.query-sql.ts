/**
 * backend/src/modules/tags/dal/tag.query-sql.ts
 *
 * DAL READS ONLY for tags. Same filtering rules as the categories DAL.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { TagsTable } from '../../../shared/db/schema';

export type TagRow = Selectable<TagsTable>;

export async function selectTagByIdSql(
  db: DbExecutor,
  tagId: string,
): Promise<TagRow | undefined> {
  return db
    .selectFrom('tags')
    .selectAll()
    .where('id', '=', tagId)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectTagsByIdsSql(
  db: DbExecutor,
  tagIds: readonly string[],
): Promise<TagRow[]> {
  if (tagIds.length === 0) return [];

  return db
    .selectFrom('tags')
    .selectAll()
    .where('id', 'in', [...tagIds])
    .where('deleted_at', 'is', null)
    .execute();
}

export async function selectTagsSql(
  db: DbExecutor,
  page: { skip: number; limit: number },
): Promise<TagRow[]> {
  return db
    .selectFrom('tags')
    .selectAll()
    .where('deleted_at', 'is', null)
    .orderBy('date_added', 'desc')
    .orderBy('id')
    .offset(page.skip)
    .limit(page.limit)
    .execute();
}

export async function findTagConflictsSql(
  db: DbExecutor,
  params: { name?: string; slug?: string; excludeId?: string },
): Promise<{ nameTaken: boolean; slugTaken: boolean }> {
  const { name, slug, excludeId } = params;
  if (name === undefined && slug === undefined) return { nameTaken: false, slugTaken: false };

  let query = db
    .selectFrom('tags')
    .select(['id', 'name', 'slug'])
    .where((eb) =>
      eb.or([
        ...(name !== undefined ? [eb('name', '=', name)] : []),
        ...(slug !== undefined ? [eb('slug', '=', slug)] : []),
      ]),
    );

  if (excludeId !== undefined) query = query.where('id', '!=', excludeId);

  const rows = await query.execute();

  return {
    nameTaken: name !== undefined && rows.some((r) => r.name === name),
    slugTaken: slug !== undefined && rows.some((r) => r.slug === slug),
  };
}
