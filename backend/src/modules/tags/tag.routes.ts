import type { FastifyInstance } from 'fastify';
import type { TagController } from './tag.controller';

export function registerTagRoutes(app: FastifyInstance, controller: TagController) {
  app.post('/tags', controller.create.bind(controller));
  app.get('/tags', controller.list.bind(controller));
  app.get('/tags/:id', controller.get.bind(controller));
  app.put('/tags/:id', controller.update.bind(controller));
  app.delete('/tags/:id', controller.remove.bind(controller));
}
