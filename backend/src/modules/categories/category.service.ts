/**
 * backend/src/modules/categories/category.service.ts
 *
 * WHY:
 * - Category use-cases: create, get, list, update, soft delete.
 * - Only place in the categories module allowed to start transactions.
 *
 * RULES:
 * - Slugs are normalized with generateSlug() before any uniqueness check.
 * - Mutations resolve the caller and consult the ownership policy
 *   (categories: any authenticated user).
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuthClaims } from '../../shared/http/require-auth-context';
import type { Pagination } from '../../shared/http/request-schemas';
import { resolveIdentity } from '../_shared/identity/resolve-identity';
import { assertCanMutate } from '../_shared/policies/ownership.policy';
import { TaxonomyUniqueness } from '../_shared/taxonomy/taxonomy-uniqueness';

import type { CategoryRepo, CategoryPatch } from './dal/category.repo';
import { findCategoryConflictsSql } from './dal/category.query-sql';
import { getCategoryById, listCategories } from './queries/category.queries';
import { CategoryErrors } from './category.errors';
import type { CreateCategoryInput, UpdateCategoryInput } from './category.schemas';
import type { Category } from './category.types';

export class CategoryService {
  private readonly uniqueness: TaxonomyUniqueness;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      categoryRepo: CategoryRepo;
    },
  ) {
    this.uniqueness = new TaxonomyUniqueness({
      db: deps.db,
      findConflicts: findCategoryConflictsSql,
      errors: CategoryErrors,
    });
  }

  async create(params: {
    claims: AuthClaims;
    input: CreateCategoryInput;
    requestId: string;
  }): Promise<Category> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const name = params.input.name;
    const slug = this.uniqueness.normalizeSlug(params.input.slug);

    await this.uniqueness.assertUnique({ name, slug });

    const now = new Date();
    const category = await this.uniqueness.withConflictMapping({ name, slug }, () =>
      this.deps.db.transaction().execute(async (trx) => {
        const { id } = await this.deps.categoryRepo.withDb(trx).insertCategory({
          name,
          slug,
          description: params.input.description ?? null,
          actorId: identity.id,
          now,
        });

        const created = await getCategoryById(trx, id);
        if (!created) throw new Error(`category ${id} missing after insert`);
        return created;
      }),
    );

    this.deps.logger.info({
      msg: 'categories.create.success',
      flow: 'categories.create',
      requestId: params.requestId,
      categoryId: category.id,
      userId: identity.id,
    });

    return category;
  }

  async getById(categoryId: string): Promise<Category> {
    const category = await getCategoryById(this.deps.db, categoryId);
    if (!category) throw CategoryErrors.notFound({ categoryId });
    return category;
  }

  async list(page: Pagination): Promise<Category[]> {
    return listCategories(this.deps.db, page);
  }

  async update(params: {
    claims: AuthClaims;
    categoryId: string;
    input: UpdateCategoryInput;
    requestId: string;
  }): Promise<Category> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.getById(params.categoryId);

    assertCanMutate({
      kind: 'category',
      action: 'update',
      resource: { id: existing.id, authorId: existing.addedBy },
      identity,
    });

    const patch: CategoryPatch = {
      name: params.input.name,
      slug:
        params.input.slug !== undefined
          ? this.uniqueness.normalizeSlug(params.input.slug)
          : undefined,
      description: params.input.description,
    };

    await this.uniqueness.assertUnique({
      name: patch.name,
      slug: patch.slug,
      excludeId: existing.id,
    });

    const now = new Date();
    const category = await this.uniqueness.withConflictMapping(patch, () =>
      this.deps.db.transaction().execute(async (trx) => {
        await this.deps.categoryRepo.withDb(trx).updateCategory({
          categoryId: existing.id,
          patch,
          actorId: identity.id,
          now,
        });

        const updated = await getCategoryById(trx, existing.id);
        if (!updated) throw CategoryErrors.notFound({ categoryId: existing.id });
        return updated;
      }),
    );

    this.deps.logger.info({
      msg: 'categories.update.success',
      flow: 'categories.update',
      requestId: params.requestId,
      categoryId: category.id,
      userId: identity.id,
    });

    return category;
  }

  async softDelete(params: {
    claims: AuthClaims;
    categoryId: string;
    requestId: string;
  }): Promise<void> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.getById(params.categoryId);

    assertCanMutate({
      kind: 'category',
      action: 'delete',
      resource: { id: existing.id, authorId: existing.addedBy },
      identity,
    });

    const now = new Date();
    await this.deps.db.transaction().execute(async (trx) => {
      await this.deps.categoryRepo
        .withDb(trx)
        .softDeleteCategory({ categoryId: existing.id, actorId: identity.id, now });
    });

    this.deps.logger.info({
      msg: 'categories.delete.success',
      flow: 'categories.delete',
      requestId: params.requestId,
      categoryId: existing.id,
      userId: identity.id,
    });
  }
}
