/**
 * backend/src/modules/auth/helpers/login-throttle.ts
 *
 * WHY:
 * - Login is throttled on two independent axes:
 *   - per account (key = hashed normalized email): guessing one account's password
 *   - per address (key = client IP): spraying many accounts from one source
 * - Each axis is its own RateLimiter with its own policy (config).
 *
 * RULES:
 * - Raw emails never become cache keys; callers pass the hashed emailKey.
 * - A successful login clears only the account counter.
 */

import type { RateLimitDecision, RateLimiter } from '../../../shared/security/rate-limit';

export type LoginAttemptKeys = Readonly<{
  emailKey: string;
  ip: string;
}>;

export class LoginThrottle {
  constructor(
    private readonly limiters: Readonly<{ account: RateLimiter; address: RateLimiter }>,
  ) {}

  /**
   * Throttled when either axis is throttled; the longer retry hint wins.
   */
  async check(keys: LoginAttemptKeys): Promise<RateLimitDecision> {
    const [account, address] = await Promise.all([
      this.limiters.account.check(keys.emailKey),
      this.limiters.address.check(keys.ip),
    ]);

    const retryHints = [account, address].flatMap((d) =>
      d.status === 'throttled' ? [d.retryAfterSeconds] : [],
    );
    if (retryHints.length === 0) return { status: 'allowed' };

    return { status: 'throttled', retryAfterSeconds: Math.max(...retryHints) };
  }

  async recordFailure(keys: LoginAttemptKeys): Promise<void> {
    await Promise.all([
      this.limiters.account.recordFailure(keys.emailKey),
      this.limiters.address.recordFailure(keys.ip),
    ]);
  }

  async recordSuccess(keys: Pick<LoginAttemptKeys, 'emailKey'>): Promise<void> {
    await this.limiters.account.reset(keys.emailKey);
  }
}
