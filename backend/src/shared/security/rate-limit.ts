/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Tracks failed attempts per key (account, source address, ...) in fixed-TTL
 *   counters. One RateLimiter = one policy (scope + threshold + window).
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { scope: 'login:account', threshold: 5, windowSeconds: 900, enabled: true }, logger)
 * - const decision = await limiter.check(id)      // read-only gate
 * - await limiter.recordFailure(id)               // INCR, TTL set on first failure
 * - await limiter.reset(id)                       // DEL on success
 * - const decision = await limiter.hit(id)        // INCR-then-check, for "every attempt counts" flows
 *
 * STATES (per key):
 * - open (count < threshold) -> throttled (count >= threshold) -> open again when the
 *   counter's TTL elapses. There is no explicit unblock transition.
 *
 * ATOMICITY:
 * - INCR is atomic in Redis, so concurrent failures from the same key are never lost.
 *
 * FAILURE POLICY:
 * - Cache unreachable => fail OPEN (allow the attempt, skip the write) and log a warning.
 *   Availability of login wins over throttling precision.
 *
 * DISABLING:
 * - `enabled: false` turns every method into an allow/no-op. The decision belongs to
 *   the composition root (config), never to this class.
 */

import type { Cache } from '../cache/cache';
import type { Logger } from '../logger/logger';
import { CacheUnavailableError } from '../errors/infra-errors';

export class ThrottledError extends Error {
  constructor(public readonly retryAfterSeconds: number) {
    super('Too many attempts');
    this.name = 'ThrottledError';
  }
}

export type RateLimitPolicy = Readonly<{
  scope: string;
  threshold: number;
  windowSeconds: number;
  enabled: boolean;
}>;

export type RateLimitDecision =
  | { status: 'allowed' }
  | { status: 'throttled'; retryAfterSeconds: number };

const ALLOWED: RateLimitDecision = { status: 'allowed' };

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    readonly policy: RateLimitPolicy,
    private readonly logger: Logger,
  ) {}

  private buildKey(id: string): string {
    return `rl:${this.policy.scope}:${id}`;
  }

  private failOpen(operation: string, err: CacheUnavailableError): void {
    this.logger.warn('rate_limit.cache_unavailable', {
      flow: 'rate_limit',
      scope: this.policy.scope,
      operation,
      policy: 'fail_open',
      message: err.message,
    });
  }

  private async decide(key: string, count: number): Promise<RateLimitDecision> {
    if (count < this.policy.threshold) return ALLOWED;

    const remaining = await this.cache.ttl(key);
    return {
      status: 'throttled',
      retryAfterSeconds: remaining !== null && remaining > 0 ? remaining : this.policy.windowSeconds,
    };
  }

  /**
   * Increments the failure counter, creating it with a fresh TTL if absent.
   * Returns the new count (0 when disabled or when the cache is unreachable).
   */
  async recordFailure(id: string): Promise<number> {
    if (!this.policy.enabled) return 0;

    try {
      return await this.cache.incr(this.buildKey(id), { ttlSeconds: this.policy.windowSeconds });
    } catch (err) {
      if (err instanceof CacheUnavailableError) {
        this.failOpen('record_failure', err);
        return 0;
      }
      throw err;
    }
  }

  /**
   * Read-only gate. Throttled when count >= threshold; the retry hint is the
   * counter's remaining TTL.
   */
  async check(id: string): Promise<RateLimitDecision> {
    if (!this.policy.enabled) return ALLOWED;

    const key = this.buildKey(id);
    try {
      const raw = await this.cache.get(key);
      const count = raw === null ? 0 : Number(raw);
      return await this.decide(key, count);
    } catch (err) {
      if (err instanceof CacheUnavailableError) {
        this.failOpen('check', err);
        return ALLOWED;
      }
      throw err;
    }
  }

  /**
   * Counts this attempt, then decides. The attempt that pushes the counter past the
   * threshold is itself throttled (INCR-then-check, no TOCTOU race).
   */
  async hit(id: string): Promise<RateLimitDecision> {
    if (!this.policy.enabled) return ALLOWED;

    const key = this.buildKey(id);
    try {
      const count = await this.cache.incr(key, { ttlSeconds: this.policy.windowSeconds });
      return await this.decide(key, count - 1);
    } catch (err) {
      if (err instanceof CacheUnavailableError) {
        this.failOpen('hit', err);
        return ALLOWED;
      }
      throw err;
    }
  }

  async reset(id: string): Promise<void> {
    if (!this.policy.enabled) return;

    try {
      await this.cache.del(this.buildKey(id));
    } catch (err) {
      if (err instanceof CacheUnavailableError) {
        this.failOpen('reset', err);
        return;
      }
      throw err;
    }
  }
}
