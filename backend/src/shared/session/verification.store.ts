/**
 * src/shared/session/verification.store.ts
 *
 * WHY:
 * - At most one email_verify token may be valid per principal.
 * - The cache keeps a pointer to the outstanding token (nonce + expiry). Issuing a
 *   new token swaps the pointer atomically (SET ... GET) and hands back the previous
 *   one so the caller can revoke it.
 * - A token whose nonce is not the current pointer is superseded, even if writing its
 *   revocation entry failed. Two concurrent issues can never both stay current.
 *
 * RULES:
 * - Depends only on Cache (DIP).
 * - A corrupted pointer reads as "no pointer" (callers then fail closed).
 */

import { z } from 'zod';
import type { Cache } from '../cache/cache';
import { VERIFY_CURRENT_PREFIX, type VerificationPointer } from './revocation.types';

const PointerSchema = z.object({
  nonce: z.string().min(1),
  expiresAt: z.number().int(),
});

function parsePointer(raw: string | null): VerificationPointer | null {
  if (raw === null) return null;

  try {
    const parsed = PointerSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    // not JSON
    return null;
  }
}

export class VerificationStore {
  constructor(private readonly cache: Cache) {}

  private key(principalId: string): string {
    return `${VERIFY_CURRENT_PREFIX}:${principalId}`;
  }

  /**
   * Makes `pointer` the outstanding verification token and returns the one it replaced.
   */
  async swapCurrent(
    principalId: string,
    pointer: VerificationPointer,
    ttlSeconds: number,
  ): Promise<VerificationPointer | null> {
    const previous = await this.cache.swap(this.key(principalId), JSON.stringify(pointer), {
      ttlSeconds: Math.max(1, ttlSeconds),
    });
    return parsePointer(previous);
  }

  async isCurrent(principalId: string, nonce: string): Promise<boolean> {
    const current = parsePointer(await this.cache.get(this.key(principalId)));
    return current !== null && current.nonce === nonce;
  }

  async clear(principalId: string): Promise<void> {
    await this.cache.del(this.key(principalId));
  }
}
