/**
 * backend/src/modules/categories/category.types.ts
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { Audit, Lifecycle } from '../../shared/db/lifecycle';

export type Category = Audit & {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  lifecycle: Lifecycle;
};

export type CategoryResponse = {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  dateAdded: Date;
  dateUpdated: Date;
};

export function toCategoryResponse(category: Category): CategoryResponse {
  return {
    id: category.id,
    name: category.name,
    slug: category.slug,
    description: category.description,
    dateAdded: category.dateAdded,
    dateUpdated: category.dateUpdated,
  };
}
