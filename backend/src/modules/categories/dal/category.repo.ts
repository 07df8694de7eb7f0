/**
 * backend/src/modules/categories/dal/category.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for categories.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import { randomUUID } from 'node:crypto';
import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CategoriesTable } from '../../../shared/db/schema';

export type CategoryPatch = {
  name?: string;
  slug?: string;
  description?: string | null;
};

export class CategoryRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): CategoryRepo {
    return new CategoryRepo(db);
  }

  async insertCategory(params: {
    name: string;
    slug: string;
    description: string | null;
    actorId: string;
    now: Date;
  }): Promise<{ id: string }> {
    const id = randomUUID();

    await this.db
      .insertInto('categories')
      .values({
        id,
        name: params.name,
        slug: params.slug,
        description: params.description,
        date_added: params.now,
        date_updated: params.now,
        added_by: params.actorId,
        updated_by: params.actorId,
        deleted_at: null,
      })
      .execute();

    return { id };
  }

  async updateCategory(params: {
    categoryId: string;
    patch: CategoryPatch;
    actorId: string;
    now: Date;
  }): Promise<void> {
    const set: Updateable<CategoriesTable> = {
      updated_by: params.actorId,
      date_updated: params.now,
    };
    if (params.patch.name !== undefined) set.name = params.patch.name;
    if (params.patch.slug !== undefined) set.slug = params.patch.slug;
    if (params.patch.description !== undefined) set.description = params.patch.description;

    await this.db
      .updateTable('categories')
      .set(set)
      .where('id', '=', params.categoryId)
      .where('deleted_at', 'is', null)
      .execute();
  }

  async softDeleteCategory(params: { categoryId: string; actorId: string; now: Date }) {
    await this.db
      .updateTable('categories')
      .set({
        deleted_at: params.now,
        updated_by: params.actorId,
        date_updated: params.now,
      })
      .where('id', '=', params.categoryId)
      .where('deleted_at', 'is', null)
      .execute();
  }
}
