/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Owns GET /users/me; the auth module consumes its CredentialStore.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { CredentialStore } from './credential-store';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { credentialStore: CredentialStore }) {
  const controller = new UserController(deps.credentialStore);

  return {
    credentialStore: deps.credentialStore,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
