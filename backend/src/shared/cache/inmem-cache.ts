/**
 * backend/src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests and local dev to run without Redis.
 * - di.ts falls back to it when REDIS_URL is not configured.
 *
 * NOTE:
 * - Counters are per process. With more than one instance, use Redis.
 */

import type { Cache } from './cache';

type Entry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, Entry>();

  private now(): number {
    return Date.now();
  }

  private getEntry(key: string): Entry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Same as the Redis adapter: the first hit opens the window.
    const expiresAtMs =
      entry?.expiresAtMs ?? (opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }
}
