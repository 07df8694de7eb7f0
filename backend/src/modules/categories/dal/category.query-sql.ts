/**
 * backend/src/modules/categories/dal/category.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for categories.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 * - Public reads filter deleted_at; uniqueness probes do not, because the
 *   unique constraints still cover soft-deleted rows.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CategoriesTable } from '../../../shared/db/schema';

export type CategoryRow = Selectable<CategoriesTable>;

export async function selectCategoryByIdSql(
  db: DbExecutor,
  categoryId: string,
): Promise<CategoryRow | undefined> {
  return db
    .selectFrom('categories')
    .selectAll()
    .where('id', '=', categoryId)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectCategoriesByIdsSql(
  db: DbExecutor,
  categoryIds: readonly string[],
): Promise<CategoryRow[]> {
  if (categoryIds.length === 0) return [];

  return db
    .selectFrom('categories')
    .selectAll()
    .where('id', 'in', [...categoryIds])
    .where('deleted_at', 'is', null)
    .execute();
}

export async function selectCategoriesSql(
  db: DbExecutor,
  page: { skip: number; limit: number },
): Promise<CategoryRow[]> {
  return db
    .selectFrom('categories')
    .selectAll()
    .where('deleted_at', 'is', null)
    .orderBy('date_added', 'desc')
    .orderBy('id')
    .offset(page.skip)
    .limit(page.limit)
    .execute();
}

export async function findCategoryConflictsSql(
  db: DbExecutor,
  params: { name?: string; slug?: string; excludeId?: string },
): Promise<{ nameTaken: boolean; slugTaken: boolean }> {
  const { name, slug, excludeId } = params;
  if (name === undefined && slug === undefined) return { nameTaken: false, slugTaken: false };

  let query = db
    .selectFrom('categories')
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
