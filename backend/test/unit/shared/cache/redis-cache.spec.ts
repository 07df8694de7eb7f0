import { beforeEach, describe, expect, it, vi } from 'vitest';

const redis = vi.hoisted(() => {
  const counters = new Map<string, number>();
  const ttls = new Map<string, number>();

  const client = {
    on: vi.fn(),
    connect: vi.fn(async () => undefined),
    quit: vi.fn(async () => 'OK'),
    incr: vi.fn(async (key: string) => {
      const next = (counters.get(key) ?? 0) + 1;
      counters.set(key, next);
      return next;
    }),
    ttl: vi.fn(async (key: string) => {
      if (!counters.has(key)) return -2;
      return ttls.get(key) ?? -1;
    }),
    expire: vi.fn(async (key: string, seconds: number) => {
      ttls.set(key, seconds);
      return true;
    }),
  };

  return { counters, ttls, client };
});

vi.mock('redis', () => ({ createClient: () => redis.client }));

import { RedisCache } from '../../../../src/shared/cache/redis-cache';

describe('RedisCache.incr', () => {
  beforeEach(() => {
    redis.counters.clear();
    redis.ttls.clear();
  });

  it('opens the window on the first hit and leaves it alone afterwards', async () => {
    const cache = await RedisCache.connect('redis://localhost:6379');

    expect(await cache.incr('rl:ip:1', { ttlSeconds: 60 })).toBe(1);
    expect(await cache.incr('rl:ip:1', { ttlSeconds: 60 })).toBe(2);

    expect(redis.client.expire).toHaveBeenCalledTimes(1);
    expect(redis.client.expire).toHaveBeenCalledWith('rl:ip:1', 60);
  });

  it('sets an expiry on a counter that was left without one', async () => {
    redis.counters.set('rl:ip:2', 7);
    const cache = await RedisCache.connect('redis://localhost:6379');

    expect(await cache.incr('rl:ip:2', { ttlSeconds: 30 })).toBe(8);

    expect(redis.ttls.get('rl:ip:2')).toBe(30);
  });

  it('does not touch the expiry without a ttl', async () => {
    const cache = await RedisCache.connect('redis://localhost:6379');

    await cache.incr('plain');

    expect(redis.client.ttl).not.toHaveBeenCalled();
    expect(redis.client.expire).not.toHaveBeenCalled();
  });
});
