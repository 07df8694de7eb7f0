import type { DbExecutor } from '../../../shared/db/db';
import { lifecycleFromDeletedAt } from '../../../shared/db/lifecycle';
import {
  selectTagsByIdsSql,
  selectTagsSql,
  selectTagByIdSql,
} from '../dal/tag.query-sql';
import type { TagRow } from '../dal/tag.query-sql';
import type { Tag } from '../tag.types';

function toTag(row: TagRow): Tag {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    lifecycle: lifecycleFromDeletedAt(row.deleted_at),
    dateAdded: row.date_added,
    dateUpdated: row.date_updated,
    addedBy: row.added_by,
    updatedBy: row.updated_by,
  };
}

export async function getTagById(
  db: DbExecutor,
  tagId: string,
): Promise<Tag | undefined> {
  const row = await selectTagByIdSql(db, tagId);
  if (!row) return undefined;
  return toTag(row);
}

export async function getTagsByIds(
  db: DbExecutor,
  tagIds: readonly string[],
): Promise<Map<string, Tag>> {
  const rows = await selectTagsByIdsSql(db, tagIds);
  return new Map(rows.map((row) => [row.id, toTag(row)]));
}

export async function listTags(
  db: DbExecutor,
  page: { skip: number; limit: number },
): Promise<Tag[]> {
  const rows = await selectTagsSql(db, page);
  return rows.map(toTag);
}
