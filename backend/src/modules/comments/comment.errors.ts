/**
 * backend/src/modules/comments/comment.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const CommentErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Comment not found', meta);
  },

  postNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Post not found', meta);
  },

  parentNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Parent comment not found', meta);
  },
} as const;
