/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Single entry point for every authentication operation: register, login,
 *   refresh, logout, authenticate (bearer), email verification, change password.
 * - Each operation is a flow under ./flows; this class owns the dependency bag and
 *   hands each flow exactly what it needs.
 *
 * RULES:
 * - No HTTP concerns (controller handles that).
 * - Never store/log raw passwords or tokens.
 * - `now` is always passed in: flows never read the clock themselves.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { RevocationStore } from '../../shared/session/revocation.store';
import type { VerificationPointer } from '../../shared/session/revocation.types';
import type { VerificationStore } from '../../shared/session/verification.store';
import type { CredentialStore, PrincipalProfile } from '../users';

import { AuthErrors } from './auth.errors';
import type { AuthenticatedPrincipal, RefreshResult, TokenPair } from './auth.types';
import type { LoginThrottle } from './helpers/login-throttle';
import { validateToken } from './helpers/validate-token';

import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';
import { executeRefreshFlow, type RefreshParams } from './flows/refresh/execute-refresh-flow';
import {
  executeLogoutFlow,
  type LogoutOutcome,
  type LogoutParams,
} from './flows/logout/execute-logout-flow';
import { sendVerificationFlow } from './flows/verification/send-verification-flow';
import {
  confirmVerificationFlow,
  type ConfirmVerificationParams,
} from './flows/verification/confirm-verification-flow';
import {
  requestVerificationEmailFlow,
  type RequestVerificationEmailOutcome,
  type RequestVerificationEmailParams,
} from './flows/verification/request-verification-email-flow';
import {
  changePasswordFlow,
  type ChangePasswordParams,
} from './flows/change-password/change-password-flow';

export type AuthServiceDeps = {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  codec: TokenCodec;
  revocations: RevocationStore;
  verifications: VerificationStore;
  loginThrottle: LoginThrottle;
  registerLimiter: RateLimiter;
  verifyRequestLimiter: RateLimiter;
  queue: Queue;
  logger: Logger;
  options: {
    rotateRefreshTokens: boolean;
    requireVerifiedEmail: boolean;
  };
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(params: RegisterParams): Promise<PrincipalProfile> {
    return executeRegisterFlow(
      {
        credentialStore: this.deps.credentialStore,
        passwordHasher: this.deps.passwordHasher,
        tokenHasher: this.deps.tokenHasher,
        registerLimiter: this.deps.registerLimiter,
        codec: this.deps.codec,
        revocations: this.deps.revocations,
        verifications: this.deps.verifications,
        queue: this.deps.queue,
        logger: this.deps.logger,
      },
      params,
    );
  }

  async login(params: LoginParams): Promise<TokenPair> {
    return executeLoginFlow(
      {
        credentialStore: this.deps.credentialStore,
        passwordHasher: this.deps.passwordHasher,
        tokenHasher: this.deps.tokenHasher,
        throttle: this.deps.loginThrottle,
        codec: this.deps.codec,
        logger: this.deps.logger,
        requireVerifiedEmail: this.deps.options.requireVerifiedEmail,
      },
      params,
    );
  }

  async refresh(params: RefreshParams): Promise<RefreshResult> {
    return executeRefreshFlow(
      {
        codec: this.deps.codec,
        revocations: this.deps.revocations,
        logger: this.deps.logger,
        rotateRefreshTokens: this.deps.options.rotateRefreshTokens,
      },
      params,
    );
  }

  async logout(params: LogoutParams): Promise<LogoutOutcome> {
    return executeLogoutFlow(
      { codec: this.deps.codec, revocations: this.deps.revocations, logger: this.deps.logger },
      params,
    );
  }

  /**
   * Validates an access token (bearer hook). Throws AuthFailureError on any failure.
   */
  async authenticate(rawAccessToken: string, now: Date): Promise<AuthenticatedPrincipal> {
    const token = await validateToken(
      { codec: this.deps.codec, revocations: this.deps.revocations, logger: this.deps.logger },
      rawAccessToken,
      'access',
      now,
    );
    return { principalId: token.subject };
  }

  async sendVerification(params: {
    principalId: string;
    requestId: string;
    now: Date;
  }): Promise<VerificationPointer> {
    const principal = await this.deps.credentialStore.findById(params.principalId);
    if (!principal) throw AuthErrors.invalidCredentials({ reason: 'unknown_principal' });

    return sendVerificationFlow(
      {
        codec: this.deps.codec,
        revocations: this.deps.revocations,
        verifications: this.deps.verifications,
        queue: this.deps.queue,
        logger: this.deps.logger,
      },
      { principal, requestId: params.requestId, now: params.now },
    );
  }

  async requestVerificationEmail(
    params: RequestVerificationEmailParams,
  ): Promise<RequestVerificationEmailOutcome> {
    return requestVerificationEmailFlow(
      {
        credentialStore: this.deps.credentialStore,
        tokenHasher: this.deps.tokenHasher,
        requestLimiter: this.deps.verifyRequestLimiter,
        codec: this.deps.codec,
        revocations: this.deps.revocations,
        verifications: this.deps.verifications,
        queue: this.deps.queue,
        logger: this.deps.logger,
      },
      params,
    );
  }

  async confirmVerification(params: ConfirmVerificationParams): Promise<AuthenticatedPrincipal> {
    return confirmVerificationFlow(
      {
        codec: this.deps.codec,
        revocations: this.deps.revocations,
        verifications: this.deps.verifications,
        credentialStore: this.deps.credentialStore,
        logger: this.deps.logger,
      },
      params,
    );
  }

  async changePassword(params: ChangePasswordParams): Promise<void> {
    return changePasswordFlow(
      {
        credentialStore: this.deps.credentialStore,
        passwordHasher: this.deps.passwordHasher,
        codec: this.deps.codec,
        revocations: this.deps.revocations,
        logger: this.deps.logger,
      },
      params,
    );
  }
}
