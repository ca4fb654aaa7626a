/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Requests are either anonymous or carry a valid access token.
 * - The bearer hook reads `Authorization: Bearer <token>` and, if the token validates,
 *   fills req.authContext. It never throws for a bad token: endpoints decide whether
 *   authentication is required (see require-auth-context.ts).
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an anonymous context on every request.
 * 2. The bearer hook asks the AccessTokenAuthenticator (auth module) to validate the token.
 * 3. Any 401-class AppError leaves the request anonymous; other failures propagate
 *    to the error handler.
 *
 * RULES:
 * - shared/ stays module-agnostic: the authenticator is a structural interface.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type AuthContext = {
  principalId: string | null;
};

export interface AccessTokenAuthenticator {
  authenticate(rawAccessToken: string, now: Date): Promise<{ principalId: string }>;
}

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1] ?? null;
}

export function registerAuthContext(app: FastifyInstance, authenticator: AccessTokenAuthenticator) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.authContext = { principalId: null };

    const rawToken = parseBearerToken(req.headers.authorization);
    if (!rawToken) return;

    try {
      const { principalId } = await authenticator.authenticate(rawToken, new Date());
      req.authContext = { principalId };
    } catch (err) {
      if (err instanceof AppError && err.status === 401) return;
      throw err;
    }
  });
}
