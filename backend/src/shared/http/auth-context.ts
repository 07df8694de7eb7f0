/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) is resolved once per request, before any
 *   route handler runs. Routes then decide whether they need it.
 * - Public routes (GET /posts) ignore it; protected routes call
 *   requireAuthContext(req).
 *
 * HOW IT WORKS:
 * 1. Every request starts unauthenticated (userId null).
 * 2. If an `Authorization: Bearer <token>` header is present, the token is
 *    verified as an ACCESS token.
 * 3. On success, userId is the token subject. On failure, the reason is kept
 *    for internal logging only; every failure looks the same to the caller.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { TokenRejection, TokenService } from '../security/token-service';
import { withRequestContext } from '../logger/with-context';

export type AuthFailure = 'missing' | 'malformed_header' | TokenRejection;

export type AuthContext = {
  userId: string | null;
  failure: AuthFailure | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: unknown): string | null {
  if (typeof header !== 'string') return null;
  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1] ?? null;
}

export function resolveAuthContext(header: unknown, tokenService: TokenService): AuthContext {
  if (header === undefined) return { userId: null, failure: 'missing' };

  const token = extractBearerToken(header);
  if (!token) return { userId: null, failure: 'malformed_header' };

  const verification = tokenService.verifyAccessToken(token);
  if (!verification.valid) return { userId: null, failure: verification.reason };

  return { userId: verification.claims.sub, failure: null };
}

export function registerAuthContext(app: FastifyInstance, tokenService: TokenService) {
  app.decorateRequest('authContext', null, []);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = resolveAuthContext(req.headers.authorization, tokenService);

    if (req.authContext.failure && req.authContext.failure !== 'missing') {
      withRequestContext(req).debug('auth.token_rejected', {
        flow: 'http.auth',
        reason: req.authContext.failure,
      });
    }

    done();
  });
}
