/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Stored credentials are salted, adaptive bcrypt hashes.
 * - Cost comes from config (BCRYPT_COST); tests use the minimum cost to stay fast.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 */

import bcrypt from 'bcryptjs';
import type { PasswordHasher } from './password-hasher';

const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$/;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    // bcrypt.compare rejects on garbage input; a corrupt hash is just "no match".
    if (!BCRYPT_HASH_PATTERN.test(hash)) return false;
    return bcrypt.compare(plain, hash);
  }
}
