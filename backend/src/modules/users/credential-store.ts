/**
 * backend/src/modules/users/credential-store.ts
 *
 * WHY:
 * - The auth flows need five operations on principals; they depend on this
 *   interface, not on Kysely (tests use an in-memory implementation).
 *
 * RULES:
 * - Emails arrive already normalized (auth/helpers/email.ts).
 * - Implementations throw StoreUnavailableError when the store cannot answer,
 *   and DuplicateEmailError when save() hits the unique email constraint.
 * - setVerified / updatePasswordHash return false when the principal does not exist.
 */

import type { NewPrincipal, Principal, PrincipalId } from './user.types';

export class DuplicateEmailError extends Error {
  constructor() {
    super('Email already registered');
    this.name = 'DuplicateEmailError';
  }
}

export interface CredentialStore {
  findByEmail(email: string): Promise<Principal | null>;
  findById(id: PrincipalId): Promise<Principal | null>;
  save(principal: NewPrincipal): Promise<Principal>;
  setVerified(id: PrincipalId): Promise<boolean>;
  updatePasswordHash(id: PrincipalId, passwordHash: string): Promise<boolean>;
}
