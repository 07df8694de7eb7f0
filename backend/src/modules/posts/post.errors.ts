/**
 * backend/src/modules/posts/post.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const PostErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Post not found', meta);
  },

  slugTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Slug already in use', meta);
  },

  emptySlug(meta?: AppErrorMeta) {
    return AppError.validationError('Slug must contain at least one letter or digit', meta);
  },

  categoryNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Category not found', meta);
  },

  authorNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },
} as const;
