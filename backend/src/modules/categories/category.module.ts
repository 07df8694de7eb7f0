/**
 * backend/src/modules/categories/category.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import { CategoryRepo } from './dal/category.repo';
import { CategoryService } from './category.service';
import { CategoryController } from './category.controller';
import { registerCategoryRoutes } from './category.routes';

export type CategoryModule = ReturnType<typeof createCategoryModule>;

export function createCategoryModule(deps: { db: DbExecutor; logger: Logger }) {
  const categoryRepo = new CategoryRepo(deps.db);
  const categoryService = new CategoryService({
    db: deps.db,
    logger: deps.logger,
    categoryRepo,
  });
  const controller = new CategoryController(categoryService);

  return {
    categoryService,
    registerRoutes(app: FastifyInstance) {
      registerCategoryRoutes(app, controller);
    },
  };
}
