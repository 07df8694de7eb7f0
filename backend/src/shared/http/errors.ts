/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. posts/post.errors.ts).
 * - CONFLICT (uniqueness violation) is a client error and maps to 400, like
 *   any other rejected input.
 * - `details` is the only part besides code/message that reaches clients:
 *   field path + message per validation issue, nothing else from the issue.
 */

import type { ZodIssue } from 'zod';

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'FORBIDDEN',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'RATE_LIMITED',
  'CONFLICT',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export type FieldIssue = {
  path: string;
  message: string;
};

export function toFieldIssues(issues: readonly ZodIssue[]): FieldIssue[] {
  return issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;
  readonly details?: FieldIssue[];

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    details?: FieldIssue[];
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.details = opts.details;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta });
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta) {
    return new AppError({ code: 'FORBIDDEN', status: 403, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta });
  }

  /** Rejected request input; clients get one detail per issue. */
  static invalidInput(message: string, issues: readonly ZodIssue[]) {
    return new AppError({
      code: 'VALIDATION_ERROR',
      status: 400,
      message,
      meta: { issues },
      details: toFieldIssues(issues),
    });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', status: 400, message, meta });
  }
}
