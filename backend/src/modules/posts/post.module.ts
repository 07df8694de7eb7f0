/**
 * backend/src/modules/posts/post.module.ts
 *
 * WHY:
 * - Encapsulates Posts module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import { PostRepo } from './dal/post.repo';
import { PostService } from './post.service';
import { PostController } from './post.controller';
import { registerPostRoutes } from './post.routes';

export type PostModule = ReturnType<typeof createPostModule>;

export function createPostModule(deps: { db: DbExecutor; logger: Logger }) {
  const postRepo = new PostRepo(deps.db);
  const postService = new PostService({ db: deps.db, logger: deps.logger, postRepo });
  const controller = new PostController(postService);

  return {
    postService,
    registerRoutes(app: FastifyInstance) {
      registerPostRoutes(app, controller);
    },
  };
}
