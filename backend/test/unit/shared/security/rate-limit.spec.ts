import { describe, expect, it } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimitError, RateLimiter } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter', () => {
  it('allows exactly `limit` hits per window, then throws', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const hit = () => limiter.hitOrThrow({ key: 'ip:1.2.3.4', limit: 3, windowSeconds: 60 });

    await hit();
    await hit();
    await hit();

    await expect(hit()).rejects.toBeInstanceOf(RateLimitError);
  });

  it('reports the prefixed key and policy on the error', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    await limiter.hitOrThrow({ key: 'ip:a', limit: 1, windowSeconds: 30 });

    const err = await limiter
      .hitOrThrow({ key: 'ip:a', limit: 1, windowSeconds: 30 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitError);
    if (!(err instanceof RateLimitError)) return;
    expect(err.key).toBe('rl:ip:a');
    expect(err.limit).toBe(1);
    expect(err.windowSeconds).toBe(30);
  });

  it('counts keys independently', async () => {
    const limiter = new RateLimiter(new InMemCache());

    await limiter.hitOrThrow({ key: 'ip:a', limit: 1, windowSeconds: 60 });
    await expect(
      limiter.hitOrThrow({ key: 'ip:b', limit: 1, windowSeconds: 60 }),
    ).resolves.toBeUndefined();
  });

  it('never throws when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });

    for (let i = 0; i < 5; i++) {
      await limiter.hitOrThrow({ key: 'ip:a', limit: 1, windowSeconds: 60 });
    }
  });
});
