/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for principals (the accounts that authenticate).
 * - One normalized email = one principal.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - passwordHash never leaves the auth module: HTTP responses use PrincipalProfile.
 */

export type PrincipalId = string;

export type Principal = {
  id: PrincipalId;
  email: string;
  passwordHash: string;
  verified: boolean;
  createdAt: Date;
};

export type NewPrincipal = {
  email: string;
  passwordHash: string;
};

export type PrincipalProfile = Omit<Principal, 'passwordHash'>;

export function toProfile(principal: Principal): PrincipalProfile {
  return {
    id: principal.id,
    email: principal.email,
    verified: principal.verified,
    createdAt: principal.createdAt,
  };
}
