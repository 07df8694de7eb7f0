/**
 * backend/src/modules/categories/category.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { CategoryController } from './category.controller';

export function registerCategoryRoutes(app: FastifyInstance, controller: CategoryController) {
  app.post('/categories', controller.create.bind(controller));
  app.get('/categories', controller.list.bind(controller));
  app.get('/categories/:id', controller.get.bind(controller));
  app.put('/categories/:id', controller.update.bind(controller));
  app.delete('/categories/:id', controller.remove.bind(controller));
}
