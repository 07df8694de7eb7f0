/**
 * backend/src/modules/tags/tag.schemas.ts
 *
 * RULES:
 * - Slugs are normalized in the service, not here.
 */

import { z } from 'zod';
import { paginationSchema } from '../../shared/http/request-schemas';

export const createTagSchema = z.object({
  name: z.string().trim().min(1).max(100),
  slug: z.string().min(1).max(100),
});

export type CreateTagInput = z.infer<typeof createTagSchema>;

export const updateTagSchema = createTagSchema.partial();

export type UpdateTagInput = z.infer<typeof updateTagSchema>;

export const listTagsQuerySchema = paginationSchema({ defaultLimit: 100, maxLimit: 500 });
