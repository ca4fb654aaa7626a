/**
 * src/shared/session/revocation.store.ts
 *
 * WHY:
 * - Signed tokens are self-contained; logout, password change and one-time
 *   verification links need a way to invalidate them before natural expiry.
 * - Revocation entries live in the cache with a TTL equal to the remaining validity
 *   of what they invalidate, so they clean themselves up.
 *
 * KEYS:
 * - revoked:jti:{nonce}                 -> revocation time (epoch seconds)
 * - revoked:sub:{subject}:{purpose}     -> revocation time (epoch milliseconds); revokes
 *                                          every token of that subject+purpose with
 *                                          iat_ms <= value
 *
 * RULES:
 * - Depends only on Cache (DIP). Works with Redis in prod, InMemCache in tests.
 * - Errors propagate (CacheUnavailableError). Callers decide: validation fails CLOSED.
 * - An entry never expires before the token it revokes stops being accepted:
 *   TTL = acceptedUntil(expiresAt) - now, at least 1 second.
 */

import type { Cache } from '../cache/cache';
import { toEpochSeconds, type TokenPurpose } from '../security/token-codec';
import { REVOKED_NONCE_PREFIX, REVOKED_SUBJECT_PREFIX, type RevocableToken } from './revocation.types';

export class RevocationStore {
  constructor(
    private readonly cache: Cache,
    private readonly opts: { graceSeconds: number },
  ) {}

  private nonceKey(nonce: string): string {
    return `${REVOKED_NONCE_PREFIX}:${nonce}`;
  }

  private subjectKey(subject: string, purpose: TokenPurpose): string {
    return `${REVOKED_SUBJECT_PREFIX}:${subject}:${purpose}`;
  }

  private remainingSeconds(expiresAt: number, now: Date): number {
    return expiresAt + this.opts.graceSeconds - toEpochSeconds(now);
  }

  /**
   * Revokes one token by nonce. No-op for a token that is already past its
   * acceptance window (nothing left to protect).
   */
  async revokeToken(token: Pick<RevocableToken, 'nonce' | 'expiresAt'>, now: Date): Promise<void> {
    const remaining = this.remainingSeconds(token.expiresAt, now);
    if (remaining < 0) return;

    await this.cache.set(this.nonceKey(token.nonce), String(toEpochSeconds(now)), {
      ttlSeconds: Math.max(1, remaining),
    });
  }

  /**
   * Revokes one token by nonce and reports whether this call did it.
   * The write and the read of the previous entry are one atomic swap, so of several
   * concurrent claims on the same nonce exactly one returns true.
   */
  async claimToken(token: Pick<RevocableToken, 'nonce' | 'expiresAt'>, now: Date): Promise<boolean> {
    const remaining = this.remainingSeconds(token.expiresAt, now);
    if (remaining < 0) return false;

    const previous = await this.cache.swap(this.nonceKey(token.nonce), String(toEpochSeconds(now)), {
      ttlSeconds: Math.max(1, remaining),
    });
    return previous === null;
  }

  /**
   * Bulk revocation: every token of `purpose` for `subject` issued at or before `now`
   * (millisecond precision).
   * `lifetimeSeconds` is the purpose's token lifetime (the longest any such token can live).
   */
  async revokeSubject(
    subject: string,
    purpose: TokenPurpose,
    now: Date,
    lifetimeSeconds: number,
  ): Promise<void> {
    await this.cache.set(this.subjectKey(subject, purpose), String(now.getTime()), {
      ttlSeconds: Math.max(1, lifetimeSeconds + this.opts.graceSeconds),
    });
  }

  async isRevoked(token: RevocableToken): Promise<boolean> {
    const [byNonce, bySubject] = await Promise.all([
      this.cache.get(this.nonceKey(token.nonce)),
      this.cache.get(this.subjectKey(token.subject, token.purpose)),
    ]);

    if (byNonce !== null) return true;
    if (bySubject === null) return false;

    const revokedAtMs = Number(bySubject);
    // Unparseable marker: treat as revoked.
    return Number.isNaN(revokedAtMs) || token.issuedAtMs <= revokedAtMs;
  }
}
