/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra (cache, store, queue, codec); the module composes the
 *   domain units on top of it (revocation, verification staging, throttles).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import { RateLimiter, type RateLimitPolicy } from '../../shared/security/rate-limit';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { RevocationStore } from '../../shared/session/revocation.store';
import { VerificationStore } from '../../shared/session/verification.store';
import type { CredentialStore } from '../users';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { LoginThrottle } from './helpers/login-throttle';

export type AuthModule = ReturnType<typeof createAuthModule>;

export type AuthRateLimitPolicies = Readonly<{
  loginAccount: RateLimitPolicy;
  loginAddress: RateLimitPolicy;
  registerAddress: RateLimitPolicy;
  verifyRequest: RateLimitPolicy;
}>;

export function createAuthModule(deps: {
  cache: Cache;
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  codec: TokenCodec;
  queue: Queue;
  logger: Logger;
  rateLimits: AuthRateLimitPolicies;
  options: {
    rotateRefreshTokens: boolean;
    requireVerifiedEmail: boolean;
  };
}) {
  const limiter = (policy: RateLimitPolicy) => new RateLimiter(deps.cache, policy, deps.logger);

  const authService = new AuthService({
    credentialStore: deps.credentialStore,
    passwordHasher: deps.passwordHasher,
    tokenHasher: deps.tokenHasher,
    codec: deps.codec,
    revocations: new RevocationStore(deps.cache, { graceSeconds: deps.codec.clockSkewSeconds }),
    verifications: new VerificationStore(deps.cache),
    loginThrottle: new LoginThrottle({
      account: limiter(deps.rateLimits.loginAccount),
      address: limiter(deps.rateLimits.loginAddress),
    }),
    registerLimiter: limiter(deps.rateLimits.registerAddress),
    verifyRequestLimiter: limiter(deps.rateLimits.verifyRequest),
    queue: deps.queue,
    logger: deps.logger,
    options: deps.options,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
