/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - HTTP adapter for the authenticated principal's own profile.
 *
 * RULES:
 * - requireAuth() first; anonymous -> 401.
 * - Never return passwordHash.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireAuth } from '../../shared/http/require-auth-context';
import type { CredentialStore } from './credential-store';
import { toProfile } from './user.types';

export class UserController {
  constructor(private readonly credentialStore: CredentialStore) {}

  async me(req: FastifyRequest, reply: FastifyReply) {
    const { principalId } = requireAuth(req);

    const principal = await this.credentialStore.findById(principalId);
    // Valid token for a principal that no longer exists.
    if (!principal) throw AppError.unauthorized('Authentication required');

    const profile = toProfile(principal);
    return reply.status(200).send({
      id: profile.id,
      email: profile.email,
      verified: profile.verified,
      createdAt: profile.createdAt.toISOString(),
    });
  }
}
