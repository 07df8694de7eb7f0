/**
 * backend/src/modules/tags/tag.service.ts
 *
 * Same shape as CategoryService: tags are shared taxonomy, so any
 * authenticated user may create, rename or delete them.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuthClaims } from '../../shared/http/require-auth-context';
import type { Pagination } from '../../shared/http/request-schemas';
import { resolveIdentity } from '../_shared/identity/resolve-identity';
import { assertCanMutate } from '../_shared/policies/ownership.policy';
import { TaxonomyUniqueness } from '../_shared/taxonomy/taxonomy-uniqueness';

import type { TagRepo, TagPatch } from './dal/tag.repo';
import { findTagConflictsSql } from './dal/tag.query-sql';
import { getTagById, listTags } from './queries/tag.queries';
import { TagErrors } from './tag.errors';
import type { CreateTagInput, UpdateTagInput } from './tag.schemas';
import type { Tag } from './tag.types';

export class TagService {
  private readonly uniqueness: TaxonomyUniqueness;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      tagRepo: TagRepo;
    },
  ) {
    this.uniqueness = new TaxonomyUniqueness({
      db: deps.db,
      findConflicts: findTagConflictsSql,
      errors: TagErrors,
    });
  }

  async create(params: {
    claims: AuthClaims;
    input: CreateTagInput;
    requestId: string;
  }): Promise<Tag> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const name = params.input.name;
    const slug = this.uniqueness.normalizeSlug(params.input.slug);

    await this.uniqueness.assertUnique({ name, slug });

    const now = new Date();
    const tag = await this.uniqueness.withConflictMapping({ name, slug }, () =>
      this.deps.db.transaction().execute(async (trx) => {
        const { id } = await this.deps.tagRepo.withDb(trx).insertTag({
          name,
          slug,
          actorId: identity.id,
          now,
        });

        const created = await getTagById(trx, id);
        if (!created) throw new Error(`tag ${id} missing after insert`);
        return created;
      }),
    );

    this.deps.logger.info({
      msg: 'tags.create.success',
      flow: 'tags.create',
      requestId: params.requestId,
      tagId: tag.id,
      userId: identity.id,
    });

    return tag;
  }

  async getById(tagId: string): Promise<Tag> {
    const tag = await getTagById(this.deps.db, tagId);
    if (!tag) throw TagErrors.notFound({ tagId });
    return tag;
  }

  async list(page: Pagination): Promise<Tag[]> {
    return listTags(this.deps.db, page);
  }

  async update(params: {
    claims: AuthClaims;
    tagId: string;
    input: UpdateTagInput;
    requestId: string;
  }): Promise<Tag> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.getById(params.tagId);

    assertCanMutate({
      kind: 'tag',
      action: 'update',
      resource: { id: existing.id, authorId: existing.addedBy },
      identity,
    });

    const patch: TagPatch = {
      name: params.input.name,
      slug:
        params.input.slug !== undefined
          ? this.uniqueness.normalizeSlug(params.input.slug)
          : undefined,
    };

    await this.uniqueness.assertUnique({
      name: patch.name,
      slug: patch.slug,
      excludeId: existing.id,
    });

    const now = new Date();
    const tag = await this.uniqueness.withConflictMapping(patch, () =>
      this.deps.db.transaction().execute(async (trx) => {
        await this.deps.tagRepo.withDb(trx).updateTag({
          tagId: existing.id,
          patch,
          actorId: identity.id,
          now,
        });

        const updated = await getTagById(trx, existing.id);
        if (!updated) throw TagErrors.notFound({ tagId: existing.id });
        return updated;
      }),
    );

    this.deps.logger.info({
      msg: 'tags.update.success',
      flow: 'tags.update',
      requestId: params.requestId,
      tagId: tag.id,
      userId: identity.id,
    });

    return tag;
  }

  async softDelete(params: {
    claims: AuthClaims;
    tagId: string;
    requestId: string;
  }): Promise<void> {
    const identity = await resolveIdentity(this.deps.db, params.claims);
    const existing = await this.getById(params.tagId);

    assertCanMutate({
      kind: 'tag',
      action: 'delete',
      resource: { id: existing.id, authorId: existing.addedBy },
      identity,
    });

    const now = new Date();
    await this.deps.db.transaction().execute(async (trx) => {
      await this.deps.tagRepo
        .withDb(trx)
        .softDeleteTag({ tagId: existing.id, actorId: identity.id, now });
    });

    this.deps.logger.info({
      msg: 'tags.delete.success',
      flow: 'tags.delete',
      requestId: params.requestId,
      tagId: existing.id,
      userId: identity.id,
    });
  }
}
