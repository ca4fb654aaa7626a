/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Raw email addresses must not end up in cache keys or operational logs.
 * - We hash them (SHA-256) into a stable, opaque key: same email -> same key,
 *   so per-account rate limiting still works.
 *
 * NOTE:
 * - This is intentionally an interface: callers depend on an abstraction (DIP).
 */

export interface TokenHasher {
  hash(rawValue: string): string;
}
