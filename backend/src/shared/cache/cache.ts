/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Revocation entries, rate-limit counters and verification-token staging are
 *   short-lived shared state. They live in the cache, never in process memory.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.swap(key, value, { ttlSeconds }) -> previous value (atomic SET ... GET)
 * - cache.incr(key, { ttlSeconds }) -> counter; TTL applied only when the key is created
 * - cache.ttl(key) -> remaining seconds, null when missing or without expiry
 *
 * ERRORS:
 * - Implementations backed by a network throw CacheUnavailableError
 *   (shared/errors/infra-errors) on connection failures and timeouts.
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically replaces the value and returns the one it replaced (or null).
   */
  swap(key: string, value: string, opts?: CacheSetOptions): Promise<string | null>;

  /**
   * Atomically increment a counter. A fresh key gets `ttlSeconds`;
   * an existing key keeps the expiry it already has. Returns the new value.
   */
  incr(key: string, opts?: CacheSetOptions): Promise<number>;

  /**
   * Remaining lifetime in whole seconds; null if the key is missing or never expires.
   */
  ttl(key: string): Promise<number | null>;
}
