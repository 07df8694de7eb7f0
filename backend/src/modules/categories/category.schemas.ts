/**
 * backend/src/modules/categories/category.schemas.ts
 *
 * RULES:
 * - Slugs are normalized in the service, not here.
 */

import { z } from 'zod';
import { paginationSchema } from '../../shared/http/request-schemas';

export const createCategorySchema = z.object({
  name: z.string().trim().min(1).max(100),
  slug: z.string().min(1).max(100),
  description: z.string().nullable().optional(),
});

export type CreateCategoryInput = z.infer<typeof createCategorySchema>;

export const updateCategorySchema = createCategorySchema.partial();

export type UpdateCategoryInput = z.infer<typeof updateCategorySchema>;

export const listCategoriesQuerySchema = paginationSchema({ defaultLimit: 100, maxLimit: 500 });
