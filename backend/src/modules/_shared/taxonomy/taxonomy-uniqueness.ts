/**
 * backend/src/modules/_shared/taxonomy/taxonomy-uniqueness.ts
 *
 * WHY:
 * - Categories and tags are both "name + slug, each unique" taxonomies.
 *   Slug normalization, the pre-write probe and the mapping of a racing
 *   unique violation live here once; each module supplies its own probe
 *   and error factories.
 *
 * RULES:
 * - Slug conflicts are reported before name conflicts.
 * - Probes run on the root executor, never inside the write transaction.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { isUniqueViolation } from '../../../shared/db/db-errors';
import type { AppError, AppErrorMeta } from '../../../shared/http/errors';
import { generateSlug } from '../../../shared/text/slug';

export type TaxonomyKeys = { name?: string; slug?: string };

export type TaxonomyConflicts = { nameTaken: boolean; slugTaken: boolean };

export type TaxonomyConflictProbe = (
  db: DbExecutor,
  params: TaxonomyKeys & { excludeId?: string },
) => Promise<TaxonomyConflicts>;

export type TaxonomyErrorFactories = {
  emptySlug(meta?: AppErrorMeta): AppError;
  nameTaken(meta?: AppErrorMeta): AppError;
  slugTaken(meta?: AppErrorMeta): AppError;
};

export class TaxonomyUniqueness {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      findConflicts: TaxonomyConflictProbe;
      errors: TaxonomyErrorFactories;
    },
  ) {}

  normalizeSlug(raw: string): string {
    const slug = generateSlug(raw);
    if (!slug) throw this.deps.errors.emptySlug({ slug: raw });
    return slug;
  }

  async assertUnique(params: TaxonomyKeys & { excludeId?: string }): Promise<void> {
    const conflicts = await this.deps.findConflicts(this.deps.db, params);
    if (conflicts.slugTaken) throw this.deps.errors.slugTaken({ slug: params.slug });
    if (conflicts.nameTaken) throw this.deps.errors.nameTaken({ name: params.name });
  }

  async withConflictMapping<T>(values: TaxonomyKeys, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      // A concurrent write took the name or slug after our probe.
      const conflicts = await this.deps.findConflicts(this.deps.db, values);
      throw conflicts.nameTaken && !conflicts.slugTaken
        ? this.deps.errors.nameTaken({ name: values.name })
        : this.deps.errors.slugTaken({ slug: values.slug });
    }
  }
}
