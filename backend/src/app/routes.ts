/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (auth, posts, comments, categories, tags)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.auth.registerRoutes(app);
  opts.deps.posts.registerRoutes(app);
  opts.deps.comments.registerRoutes(app);
  opts.deps.categories.registerRoutes(app);
  opts.deps.tags.registerRoutes(app);
}
