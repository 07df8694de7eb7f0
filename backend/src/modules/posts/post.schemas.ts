/**
 * backend/src/modules/posts/post.schemas.ts
 *
 * RULES:
 * - Slugs are normalized in the service, not here.
 * - Unknown tag ids are not a validation error: only existing tags get linked.
 */

import { z } from 'zod';
import { paginationSchema } from '../../shared/http/request-schemas';

const postPagination = paginationSchema({ defaultLimit: 10, maxLimit: 100 });

export const createPostSchema = z.object({
  title: z.string().trim().min(1).max(255),
  slug: z.string().min(1).max(255),
  content: z.string().min(1),
  excerpt: z.string().nullable().optional(),
  categoryId: z.string().uuid().nullable().optional(),
  isPublished: z.boolean().default(false),
  featuredImageUrl: z.string().url().nullable().optional(),
  tagIds: z.array(z.string().uuid()).default([]),
});

export type CreatePostInput = z.infer<typeof createPostSchema>;

export const updatePostSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  slug: z.string().min(1).max(255).optional(),
  content: z.string().min(1).optional(),
  excerpt: z.string().nullable().optional(),
  categoryId: z.string().uuid().nullable().optional(),
  isPublished: z.boolean().optional(),
  featuredImageUrl: z.string().url().nullable().optional(),
  tagIds: z.array(z.string().uuid()).optional(),
});

export type UpdatePostInput = z.infer<typeof updatePostSchema>;

export const listPostsQuerySchema = postPagination.extend({
  categoryId: z.string().uuid().optional(),
  tagId: z.string().uuid().optional(),
});

export type ListPostsQuery = z.infer<typeof listPostsQuerySchema>;

export const pagedPostsQuerySchema = postPagination;

export const searchParamsSchema = z.object({
  query: z.string().trim().min(1).max(200),
});

export const userPostsParamsSchema = z.object({
  userId: z.string().uuid(),
});

export const slugParamsSchema = z.object({
  slug: z.string().min(1).max(255),
});
