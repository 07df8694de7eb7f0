/**
 * backend/src/modules/comments/comment.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { CommentController } from './comment.controller';

export function registerCommentRoutes(app: FastifyInstance, controller: CommentController) {
  app.post('/comments/post/:postId', controller.create.bind(controller));
  app.get('/comments/post/:postId', controller.listForPost.bind(controller));
  app.get('/comments/:id', controller.get.bind(controller));
  app.put('/comments/:id', controller.update.bind(controller));
  app.delete('/comments/:id', controller.remove.bind(controller));
  app.post('/comments/:id/approve', controller.approve.bind(controller));
}
