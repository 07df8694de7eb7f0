/**
 * backend/src/modules/comments/comment.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import { CommentRepo } from './dal/comment.repo';
import { CommentService } from './comment.service';
import { CommentController } from './comment.controller';
import { registerCommentRoutes } from './comment.routes';

export type CommentModule = ReturnType<typeof createCommentModule>;

export function createCommentModule(deps: { db: DbExecutor; logger: Logger }) {
  const commentRepo = new CommentRepo(deps.db);
  const commentService = new CommentService({ db: deps.db, logger: deps.logger, commentRepo });
  const controller = new CommentController(commentService);

  return {
    commentService,
    registerRoutes(app: FastifyInstance) {
      registerCommentRoutes(app, controller);
    },
  };
}
