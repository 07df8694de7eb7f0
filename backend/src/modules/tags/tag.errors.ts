import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TagErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Tag not found', meta);
  },

  nameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Name already in use', meta);
  },

  slugTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Slug already in use', meta);
  },

  /** The slug normalized to nothing (e.g. only punctuation). */
  emptySlug(meta?: AppErrorMeta) {
    return AppError.validationError('Slug must contain at least one letter or digit', meta);
  },
} as const;
