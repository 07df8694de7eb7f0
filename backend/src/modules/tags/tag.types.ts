/**
 * backend/src/modules/tags/tag.types.ts
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { Audit, Lifecycle } from '../../shared/db/lifecycle';

export type Tag = Audit & {
  id: string;
  name: string;
  slug: string;
  lifecycle: Lifecycle;
};

export type TagResponse = {
  id: string;
  name: string;
  slug: string;
  dateAdded: Date;
  dateUpdated: Date;
};

export function toTagResponse(tag: Tag): TagResponse {
  return {
    id: tag.id,
    name: tag.name,
    slug: tag.slug,
    dateAdded: tag.dateAdded,
    dateUpdated: tag.dateUpdated,
  };
}
