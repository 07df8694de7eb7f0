/**
 * backend/src/modules/tags/dal/tag.repo.ts
 *
 * DAL WRITES ONLY for tags. Service owns tx; bind with withDb(trx).
 */

import { randomUUID } from 'node:crypto';
import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { TagsTable } from '../../../shared/db/schema';

export type TagPatch = {
  name?: string;
  slug?: string;
};

export class TagRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): TagRepo {
    return new TagRepo(db);
  }

  async insertTag(params: {
    name: string;
    slug: string;
    actorId: string;
    now: Date;
  }): Promise<{ id: string }> {
    const id = randomUUID();

    await this.db
      .insertInto('tags')
      .values({
        id,
        name: params.name,
        slug: params.slug,
        date_added: params.now,
        date_updated: params.now,
        added_by: params.actorId,
        updated_by: params.actorId,
        deleted_at: null,
      })
      .execute();

    return { id };
  }

  async updateTag(params: {
    tagId: string;
    patch: TagPatch;
    actorId: string;
    now: Date;
  }): Promise<void> {
    const set: Updateable<TagsTable> = {
      updated_by: params.actorId,
      date_updated: params.now,
    };
    if (params.patch.name !== undefined) set.name = params.patch.name;
    if (params.patch.slug !== undefined) set.slug = params.patch.slug;

    await this.db
      .updateTable('tags')
      .set(set)
      .where('id', '=', params.tagId)
      .where('deleted_at', 'is', null)
      .execute();
  }

  async softDeleteTag(params: { tagId: string; actorId: string; now: Date }) {
    await this.db
      .updateTable('tags')
      .set({
        deleted_at: params.now,
        updated_by: params.actorId,
        date_updated: params.now,
      })
      .where('id', '=', params.tagId)
      .where('deleted_at', 'is', null)
      .execute();
  }
}
