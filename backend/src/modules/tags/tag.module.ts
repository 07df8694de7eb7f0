import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import { TagRepo } from './dal/tag.repo';
import { TagService } from './tag.service';
import { TagController } from './tag.controller';
import { registerTagRoutes } from './tag.routes';

export type TagModule = ReturnType<typeof createTagModule>;

export function createTagModule(deps: { db: DbExecutor; logger: Logger }) {
  const tagRepo = new TagRepo(deps.db);
  const tagService = new TagService({
    db: deps.db,
    logger: deps.logger,
    tagRepo,
  });
  const controller = new TagController(tagService);

  return {
    tagService,
    registerRoutes(app: FastifyInstance) {
      registerTagRoutes(app, controller);
    },
  };
}
