/**
 * backend/src/shared/http/cors.ts
 *
 * WHY:
 * - Browser clients on other origins (the blog frontend) call this API.
 *
 * RULES:
 * - Only origins listed in CORS_ORIGINS are echoed back; '*' allows any.
 * - Preflight (OPTIONS with Access-Control-Request-Method) is answered here with
 *   204 and never reaches a route. A preflight from an unknown origin gets 403.
 * - Requests without an Origin header are not CORS requests and pass untouched.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

const ALLOWED_METHODS = 'GET, POST, PUT, DELETE, OPTIONS';
const ALLOWED_HEADERS = 'Content-Type, Authorization, X-Request-Id';
const MAX_AGE_SECONDS = '86400';

export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.includes('*') || allowedOrigins.includes(origin);
}

export function registerCors(app: FastifyInstance, allowedOrigins: readonly string[]) {
  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    const origin = req.headers.origin;
    if (typeof origin !== 'string') return;

    const isPreflight =
      req.method === 'OPTIONS' && req.headers['access-control-request-method'] !== undefined;

    if (!isOriginAllowed(origin, allowedOrigins)) {
      if (isPreflight) return reply.status(403).send();
      return;
    }

    void reply.header('access-control-allow-origin', origin);
    void reply.header('access-control-allow-credentials', 'true');
    void reply.header('vary', 'Origin');

    if (isPreflight) {
      void reply.header('access-control-allow-methods', ALLOWED_METHODS);
      void reply.header('access-control-allow-headers', ALLOWED_HEADERS);
      void reply.header('access-control-max-age', MAX_AGE_SECONDS);
      return reply.status(204).send();
    }
  });
}
