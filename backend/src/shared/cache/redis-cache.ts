/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache, used for rate limit counters shared by every
 *   API instance.
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 *
 * LOGGING:
 * - Redis connection errors fire outside any request context (they are client-level events,
 *   not request-level), so they go to the global logger, not withRequestContext().
 */

import { createClient } from 'redis';
import type { Cache } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const value = await this.client.incr(key);

    // A key without expiry (first hit, or an EXPIRE that never ran) gets one now.
    if (opts?.ttlSeconds) {
      const ttl = await this.client.ttl(key);
      if (ttl < 0) {
        await this.client.expire(key, opts.ttlSeconds);
      }
    }

    return value;
  }
}
