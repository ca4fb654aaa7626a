import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { logger } from '../../../../src/shared/logger/logger';
import { RateLimiter, type RateLimitPolicy } from '../../../../src/shared/security/rate-limit';
import { FailingCache } from '../../../helpers/failing-cache';

const T0 = new Date('2026-03-01T12:00:00.000Z').getTime();

function policy(overrides: Partial<RateLimitPolicy> = {}): RateLimitPolicy {
  return { scope: 'login:account', threshold: 3, windowSeconds: 60, enabled: true, ...overrides };
}

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('allows until the failure count reaches the threshold', async () => {
    const limiter = new RateLimiter(new InMemCache(), policy(), logger);

    expect(await limiter.check('acct')).toEqual({ status: 'allowed' });
    expect(await limiter.recordFailure('acct')).toBe(1);
    expect(await limiter.recordFailure('acct')).toBe(2);
    expect(await limiter.check('acct')).toEqual({ status: 'allowed' });

    expect(await limiter.recordFailure('acct')).toBe(3);
    expect(await limiter.check('acct')).toEqual({ status: 'throttled', retryAfterSeconds: 60 });
  });

  it('reports the remaining window as the retry hint', async () => {
    const limiter = new RateLimiter(new InMemCache(), policy(), logger);
    for (let i = 0; i < 3; i++) await limiter.recordFailure('acct');

    vi.setSystemTime(T0 + 20_000);

    expect(await limiter.check('acct')).toEqual({ status: 'throttled', retryAfterSeconds: 40 });
  });

  it('opens again once the window elapses', async () => {
    const limiter = new RateLimiter(new InMemCache(), policy(), logger);
    for (let i = 0; i < 3; i++) await limiter.recordFailure('acct');

    vi.setSystemTime(T0 + 60_000);

    expect(await limiter.check('acct')).toEqual({ status: 'allowed' });
    expect(await limiter.recordFailure('acct')).toBe(1);
  });

  it('starts the window at the first failure, not the latest', async () => {
    const limiter = new RateLimiter(new InMemCache(), policy(), logger);
    await limiter.recordFailure('acct');
    await limiter.recordFailure('acct');

    vi.setSystemTime(T0 + 30_000);
    await limiter.recordFailure('acct');

    expect(await limiter.check('acct')).toEqual({ status: 'throttled', retryAfterSeconds: 30 });
  });

  it('keeps keys independent', async () => {
    const limiter = new RateLimiter(new InMemCache(), policy(), logger);
    for (let i = 0; i < 3; i++) await limiter.recordFailure('acct-a');

    expect(await limiter.check('acct-b')).toEqual({ status: 'allowed' });
  });

  it('stores counters under rl:{scope}:{id}', async () => {
    const cache = new InMemCache();
    const limiter = new RateLimiter(cache, policy(), logger);

    await limiter.recordFailure('acct');

    expect(await cache.get('rl:login:account:acct')).toBe('1');
    expect(await cache.ttl('rl:login:account:acct')).toBe(60);
  });

  it('reset clears the counter', async () => {
    const limiter = new RateLimiter(new InMemCache(), policy(), logger);
    for (let i = 0; i < 3; i++) await limiter.recordFailure('acct');

    await limiter.reset('acct');

    expect(await limiter.check('acct')).toEqual({ status: 'allowed' });
  });

  it('hit counts every attempt and throttles the one past the threshold', async () => {
    const limiter = new RateLimiter(new InMemCache(), policy({ threshold: 2 }), logger);

    expect(await limiter.hit('1.2.3.4')).toEqual({ status: 'allowed' });
    expect(await limiter.hit('1.2.3.4')).toEqual({ status: 'allowed' });
    expect(await limiter.hit('1.2.3.4')).toEqual({ status: 'throttled', retryAfterSeconds: 60 });
  });

  it('does nothing when disabled', async () => {
    const cache = new InMemCache();
    const limiter = new RateLimiter(cache, policy({ enabled: false, threshold: 1 }), logger);

    expect(await limiter.recordFailure('acct')).toBe(0);
    expect(await limiter.hit('acct')).toEqual({ status: 'allowed' });
    expect(await limiter.check('acct')).toEqual({ status: 'allowed' });
    expect(await cache.get('rl:login:account:acct')).toBeNull();
  });

  it('fails open when the cache is unreachable', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const limiter = new RateLimiter(new FailingCache(), policy(), logger);

    expect(await limiter.check('acct')).toEqual({ status: 'allowed' });
    expect(await limiter.recordFailure('acct')).toBe(0);
    expect(await limiter.hit('acct')).toEqual({ status: 'allowed' });
    await expect(limiter.reset('acct')).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenCalledWith(
      'rate_limit.cache_unavailable',
      expect.objectContaining({ scope: 'login:account', operation: 'check', policy: 'fail_open' }),
    );
  });
});
