/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require authentication" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, cache or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  principalId: string;
}>;

/**
 * Controller guard: anonymous request -> 401 "Authentication required".
 */
export function requireAuth(req: FastifyRequest): RequiredAuthContext {
  const principalId = req.authContext?.principalId;
  if (!principalId) throw AppError.unauthorized('Authentication required');

  return { principalId };
}
