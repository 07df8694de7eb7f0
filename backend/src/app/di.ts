/**
 * backend/src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, cache, mailer) and shares them.
 * - Tests swap infra through `overrides` (SQLite db, in-memory queue).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (Redis or in-memory cache, rate limit on/off)
 *   belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import type { TokenService } from '../shared/security/token-service';
import { JwtTokenService } from '../shared/security/jwt-token-service';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { Queue } from '../shared/messaging/queue';
import { MailQueue } from '../shared/messaging/mail-queue';
import { NodemailerMailer } from '../shared/email/nodemailer-mailer';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createCategoryModule } from '../modules/categories/category.module';
import type { CategoryModule } from '../modules/categories/category.module';

import { createTagModule } from '../modules/tags/tag.module';
import type { TagModule } from '../modules/tags/tag.module';

import { createPostModule } from '../modules/posts/post.module';
import type { PostModule } from '../modules/posts/post.module';

import { createCommentModule } from '../modules/comments/comment.module';
import type { CommentModule } from '../modules/comments/comment.module';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;

  // messaging
  queue: Queue;

  // modules
  users: UserModule;
  auth: AuthModule;
  categories: CategoryModule;
  tags: TagModule;
  posts: PostModule;
  comments: CommentModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
  cache?: Cache;
  queue?: Queue;
};

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const db = overrides.db ?? createDb(config.databaseUrl);

  // Redis when configured, otherwise per-process counters.
  let redis: RedisCache | null = null;
  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else if (config.redisUrl) {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  } else {
    cache = new InMemCache();
  }

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  const tokenService: TokenService = new JwtTokenService({
    secret: config.jwt.secret,
    algorithm: config.jwt.algorithm,
    accessTokenTtlMinutes: config.jwt.accessTokenTtlMinutes,
    resetTokenTtlHours: config.jwt.resetTokenTtlHours,
  });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: !config.rateLimit.enabled,
  });

  const queue: Queue =
    overrides.queue ??
    new MailQueue(new NodemailerMailer(config.smtp), {
      appName: config.appName,
      publicBaseUrl: config.publicBaseUrl,
      resetTokenTtlHours: config.jwt.resetTokenTtlHours,
    });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db });

  const auth = createAuthModule({
    db,
    passwordHasher,
    tokenService,
    logger,
    queue,
    userRepo: users.userRepo,
  });

  const categories = createCategoryModule({ db, logger });
  const tags = createTagModule({ db, logger });
  const posts = createPostModule({ db, logger });
  const comments = createCommentModule({ db, logger });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    passwordHasher,
    tokenService,
    queue,
    users,
    auth,
    categories,
    tags,
    posts,
    comments,
    close: async () => {
      if (redis) await redis.close();
      await db.destroy();
    },
  };
}
