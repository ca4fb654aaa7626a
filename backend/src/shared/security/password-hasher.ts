/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Flows depend on an interface, not bcrypt directly.
 * - Tests swap in a cheap deterministic hasher.
 *
 * RULES:
 * - verify() compares in constant time (the implementation's job).
 * - verify() never throws for a hash it cannot parse: it returns false.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
