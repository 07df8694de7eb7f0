/**
 * backend/src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate limit counters must be fast and shared across instances.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 */

export interface Cache {
  /**
   * Atomically increment a counter. The TTL is applied only when the key has
   * none yet, so a window is fixed from its first hit.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;
}
