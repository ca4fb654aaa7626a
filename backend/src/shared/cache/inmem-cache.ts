/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests to run the rate limiter and revocation logic without external infra.
 * - Mirrors the Redis semantics the rest of the code relies on (INCR keeps TTL,
 *   SET ... GET returns the previous value, TTL rounds up to whole seconds).
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - Expiry reads Date.now(), so vi.setSystemTime() moves it in tests.
 */

import type { Cache, CacheSetOptions } from './cache';

type Entry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, Entry>();

  private now(): number {
    return Date.now();
  }

  private expiryFor(opts?: CacheSetOptions): number | null {
    return opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
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

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts) });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  swap(key: string, value: string, opts?: CacheSetOptions): Promise<string | null> {
    const previous = this.getEntry(key);
    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts) });
    return Promise.resolve(previous ? previous.value : null);
  }

  incr(key: string, opts?: CacheSetOptions): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    const expiresAtMs = entry ? entry.expiresAtMs : this.expiryFor(opts);
    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  ttl(key: string): Promise<number | null> {
    const entry = this.getEntry(key);
    if (!entry || entry.expiresAtMs === null) return Promise.resolve(null);

    return Promise.resolve(Math.ceil((entry.expiresAtMs - this.now()) / 1000));
  }
}
