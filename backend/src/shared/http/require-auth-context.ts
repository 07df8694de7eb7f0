/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require bearer token" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 * - Missing header, bad header, expired/forged/wrong-kind token: all the same 401.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type AuthClaims = Readonly<{
  userId: string;
}>;

export function requireAuthContext(req: FastifyRequest): AuthClaims {
  const ctx = req.authContext;
  if (!ctx || !ctx.userId) {
    throw AppError.unauthorized('Invalid authentication credentials');
  }

  return { userId: ctx.userId };
}
