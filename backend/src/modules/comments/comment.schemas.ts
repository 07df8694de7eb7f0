/**
 * backend/src/modules/comments/comment.schemas.ts
 */

import { z } from 'zod';
import { paginationSchema } from '../../shared/http/request-schemas';

export const createCommentSchema = z.object({
  content: z.string().trim().min(1),
  parentCommentId: z.string().uuid().nullable().optional(),
});

export type CreateCommentInput = z.infer<typeof createCommentSchema>;

export const updateCommentSchema = z.object({
  content: z.string().trim().min(1),
});

export type UpdateCommentInput = z.infer<typeof updateCommentSchema>;

export const listCommentsQuerySchema = paginationSchema({ defaultLimit: 20, maxLimit: 100 });

export const postParamsSchema = z.object({
  postId: z.string().uuid(),
});
