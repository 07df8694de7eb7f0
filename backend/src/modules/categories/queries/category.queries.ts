/**
 * backend/src/modules/categories/queries/category.queries.ts
 *
 * WHY:
 * - Shape DB rows into Category domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { lifecycleFromDeletedAt } from '../../../shared/db/lifecycle';
import {
  selectCategoriesByIdsSql,
  selectCategoriesSql,
  selectCategoryByIdSql,
} from '../dal/category.query-sql';
import type { CategoryRow } from '../dal/category.query-sql';
import type { Category } from '../category.types';

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description ?? null,
    lifecycle: lifecycleFromDeletedAt(row.deleted_at),
    dateAdded: row.date_added,
    dateUpdated: row.date_updated,
    addedBy: row.added_by,
    updatedBy: row.updated_by,
  };
}

export async function getCategoryById(
  db: DbExecutor,
  categoryId: string,
): Promise<Category | undefined> {
  const row = await selectCategoryByIdSql(db, categoryId);
  if (!row) return undefined;
  return toCategory(row);
}

export async function getCategoriesByIds(
  db: DbExecutor,
  categoryIds: readonly string[],
): Promise<Map<string, Category>> {
  const rows = await selectCategoriesByIdsSql(db, categoryIds);
  return new Map(rows.map((row) => [row.id, toCategory(row)]));
}

export async function listCategories(
  db: DbExecutor,
  page: { skip: number; limit: number },
): Promise<Category[]> {
  const rows = await selectCategoriesSql(db, page);
  return rows.map(toCategory);
}
