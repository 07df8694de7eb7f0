/**
 * backend/src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Every client address gets a fixed request budget per window
 *   (RATE_LIMIT_REQUESTS per RATE_LIMIT_PERIOD_SECONDS).
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'ip:1.2.3.4', limit: 100, windowSeconds: 60 })
 * - registerRateLimit(app, limiter, config.rateLimit) applies it to every request.
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. INCR is atomic in Redis, so two
 *   concurrent requests cannot both slip under the limit.
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks (tests, local dev).
 * - Never check NODE_ENV here. That decision belongs to the composition root.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
  }
}

export type RateLimitPolicy = Readonly<{
  requests: number;
  periodSeconds: number;
}>;

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key`.
   * Throws RateLimitError once the counter exceeds `limit` within the window.
   */
  async hitOrThrow(input: { key: string; limit: number; windowSeconds: number }): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }
}

export function registerRateLimit(
  app: FastifyInstance,
  limiter: RateLimiter,
  policy: RateLimitPolicy,
) {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    await limiter.hitOrThrow({
      key: `ip:${req.ip}`,
      limit: policy.requests,
      windowSeconds: policy.periodSeconds,
    });
  });
}
