/**
 * backend/src/modules/posts/post.routes.ts
 *
 * Static segments (search/, user/, slug/) win over /posts/:id in Fastify's
 * router regardless of registration order.
 */

import type { FastifyInstance } from 'fastify';
import type { PostController } from './post.controller';

export function registerPostRoutes(app: FastifyInstance, controller: PostController) {
  app.post('/posts', controller.create.bind(controller));
  app.get('/posts', controller.list.bind(controller));
  app.get('/posts/search/:query', controller.search.bind(controller));
  app.get('/posts/user/:userId', controller.listByAuthor.bind(controller));
  app.get('/posts/slug/:slug', controller.getBySlug.bind(controller));
  app.get('/posts/:id', controller.get.bind(controller));
  app.put('/posts/:id', controller.update.bind(controller));
  app.delete('/posts/:id', controller.remove.bind(controller));
}
