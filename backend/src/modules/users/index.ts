/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal.
 */

export { createUserModule, type UserModule } from './user.module';
export { DuplicateEmailError, type CredentialStore } from './credential-store';
export { KyselyCredentialStore } from './kysely-credential-store';
export { toProfile } from './user.types';
export type { NewPrincipal, Principal, PrincipalId, PrincipalProfile } from './user.types';
