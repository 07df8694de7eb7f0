/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId) so every later log line carries it
 * 2. CORS, so preflights are answered before anything else runs
 * 3. rate limit per client address
 * 4. auth context (bearer token → userId)
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerCors } from '../shared/http/cors';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerRateLimit } from '../shared/security/rate-limit';

export function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerCors(app, opts.config.corsOrigins);
  registerRateLimit(app, opts.deps.rateLimiter, opts.config.rateLimit);
  registerAuthContext(app, opts.deps.tokenService);
  registerErrorHandler(app);

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      requestId: req.requestContext.requestId,
      userId: req.authContext?.userId ?? null,
      durationMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
