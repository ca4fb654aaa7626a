/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Result shapes returned by AuthService operations (and sent by the controller).
 *
 * RULES:
 * - Raw tokens appear only in these results, never in logs or errors.
 */

import type { TOKEN_TYPE } from './auth.constants';

export type TokenType = typeof TOKEN_TYPE;

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: TokenType;
};

export type RefreshResult = {
  accessToken: string;
  tokenType: TokenType;
  /** Present only when refresh-token rotation is enabled. */
  refreshToken?: string;
};

export type AuthenticatedPrincipal = {
  principalId: string;
};
