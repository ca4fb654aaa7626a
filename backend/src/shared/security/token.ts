/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Random values (token nonces) should be generated one way across the system.
 * - base64url keeps them safe inside JWT claims, cache keys and URLs.
 *
 * HOW TO USE:
 * - const nonce = generateSecureToken(16)
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
