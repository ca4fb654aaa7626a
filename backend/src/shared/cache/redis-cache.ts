/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache (revocation entries, rate-limit counters,
 *   verification-token staging).
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 * - The offline queue is disabled: while disconnected, commands reject immediately
 *   instead of piling up. Together with the per-call timeout this keeps every cache
 *   call bounded.
 * - Every failure is rethrown as CacheUnavailableError. Callers pick fail-open or
 *   fail-closed per call site.
 *
 * LOGGING:
 * - Redis connection errors fire outside any request context (they are client-level events,
 *   not request-level). We use the global logger directly.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions } from './cache';
import { logger } from '../logger/logger';
import { withTimeout } from '../async/with-timeout';
import { CacheUnavailableError } from '../errors/infra-errors';

type RedisClient = ReturnType<typeof createClient>;

export type RedisCacheOptions = {
  host: string;
  port: number;
  timeoutMs: number;
};

export class RedisCache implements Cache {
  private constructor(
    private readonly client: RedisClient,
    private readonly timeoutMs: number,
  ) {}

  static async connect(opts: RedisCacheOptions): Promise<RedisCache> {
    const client = createClient({
      socket: { host: opts.host, port: opts.port, connectTimeout: opts.timeoutMs * 4 },
      disableOfflineQueue: true,
    });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client, opts.timeoutMs);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(work(), this.timeoutMs, `cache.${operation}`);
    } catch (err) {
      throw new CacheUnavailableError(operation, { cause: err });
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', () => this.client.get(key));
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    await this.run('set', async () => {
      if (opts?.ttlSeconds) {
        await this.client.set(key, value, { EX: opts.ttlSeconds });
        return;
      }
      await this.client.set(key, value);
    });
  }

  async del(key: string): Promise<void> {
    await this.run('del', () => this.client.del(key));
  }

  async swap(key: string, value: string, opts?: CacheSetOptions): Promise<string | null> {
    return this.run('swap', async () => {
      const previous = opts?.ttlSeconds
        ? await this.client.set(key, value, { EX: opts.ttlSeconds, GET: true })
        : await this.client.set(key, value, { GET: true });

      return typeof previous === 'string' ? previous : null;
    });
  }

  async incr(key: string, opts?: CacheSetOptions): Promise<number> {
    return this.run('incr', async () => {
      const value = await this.client.incr(key);

      if (opts?.ttlSeconds) {
        const ttl = await this.client.ttl(key);
        if (ttl < 0) {
          await this.client.expire(key, opts.ttlSeconds);
        }
      }

      return value;
    });
  }

  async ttl(key: string): Promise<number | null> {
    return this.run('ttl', async () => {
      const seconds = await this.client.ttl(key);
      return seconds >= 0 ? seconds : null;
    });
  }
}
