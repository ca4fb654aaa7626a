/**
 * backend/src/modules/auth/helpers/issue-token-pair.ts
 *
 * WHY:
 * - Login hands out an access and a refresh token together, issued at the same instant.
 */

import type { TokenCodec } from '../../../shared/security/token-codec';
import { TOKEN_TYPE } from '../auth.constants';
import type { TokenPair } from '../auth.types';

export function issueTokenPair(codec: TokenCodec, principalId: string, now: Date): TokenPair {
  return {
    accessToken: codec.issue(principalId, 'access', now).token,
    refreshToken: codec.issue(principalId, 'refresh', now).token,
    tokenType: TOKEN_TYPE,
  };
}
