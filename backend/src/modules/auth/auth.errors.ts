/**
 * backend/src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Sign-in errors never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Email already registered', meta);
  },

  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Username already taken', meta);
  },

  /** Unknown email and wrong password look the same. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password', meta);
  },

  accountInactive(meta?: AppErrorMeta) {
    return AppError.forbidden('User account is inactive', meta);
  },

  /**
   * Reset token failed verification, is of the wrong kind, or was issued
   * before the latest password change. One message for all of them.
   */
  resetTokenInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid or expired token', meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  incorrectCurrentPassword(meta?: AppErrorMeta) {
    return AppError.validationError('Incorrect current password', meta);
  },
} as const;
