/**
 * backend/src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenService } from '../../shared/security/token-service';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { UserRepo } from '../users/dal/user.repo';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  logger: Logger;
  queue: Queue;
  userRepo: UserRepo;
}) {
  const authService = new AuthService({
    db: deps.db,
    passwordHasher: deps.passwordHasher,
    tokenService: deps.tokenService,
    logger: deps.logger,
    queue: deps.queue,
    userRepo: deps.userRepo,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
