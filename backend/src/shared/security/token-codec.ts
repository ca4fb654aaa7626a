/**
 * src/shared/security/token-codec.ts
 *
 * WHY:
 * - Creates and validates signed, time-bounded tokens (JWT, compact JWS) carrying a
 *   subject and a purpose: access, refresh or email_verify.
 * - Stateless and synchronous: sign/verify are pure computation. Revocation is the
 *   caller's concern (see shared/session/revocation.store.ts).
 *
 * ALGORITHM:
 * - One HMAC algorithm is fixed at construction from configuration.
 * - verify() only accepts that algorithm. A token whose header names anything else
 *   (HS512 vs HS256, `none`, RS*) is rejected as SIGNATURE_INVALID. No negotiation.
 *
 * CLAIMS:
 * - sub, purpose, jti (random nonce), iat, exp: NumericDate seconds.
 * - iat_ms: issue time in epoch milliseconds, floor(iat_ms / 1000) === iat.
 *   Bulk revocation compares against it.
 * - exp - iat always equals the configured lifetime for the purpose.
 *
 * EXPIRY:
 * - Checked here, not by jsonwebtoken, so the boundary is exact:
 *   valid while now <= exp + clockSkewSeconds.
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';

import { ConfigError } from '../errors/infra-errors';
import { generateSecureToken } from './token';

export const TOKEN_PURPOSES = ['access', 'refresh', 'email_verify'] as const;
export type TokenPurpose = (typeof TOKEN_PURPOSES)[number];

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export type SigningKey = Readonly<{
  algorithm: SigningAlgorithm;
  secret: string;
}>;

export type TokenLifetimes = Readonly<Partial<Record<TokenPurpose, number>>>;

export type TokenCodecOptions = Readonly<{
  key: SigningKey;
  lifetimes: TokenLifetimes;
  clockSkewSeconds?: number;
}>;

export type IssuedToken = Readonly<{
  token: string;
  subject: string;
  purpose: TokenPurpose;
  nonce: string;
  issuedAt: number;
  issuedAtMs: number;
  expiresAt: number;
}>;

export type VerifiedToken = Omit<IssuedToken, 'token'>;

export type TokenErrorKind = 'MALFORMED' | 'SIGNATURE_INVALID' | 'EXPIRED';

export class TokenError extends Error {
  readonly kind: TokenErrorKind;

  constructor(kind: TokenErrorKind, message: string) {
    super(message);
    this.name = 'TokenError';
    this.kind = kind;
  }
}

const NONCE_BYTES = 16;

const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  purpose: z.enum(TOKEN_PURPOSES),
  jti: z.string().min(1),
  iat: z.number().int(),
  iat_ms: z.number().int().nonnegative(),
  exp: z.number().int(),
});

type TokenClaims = z.infer<typeof TokenClaimsSchema>;

// jsonwebtoken reports every failure as JsonWebTokenError; these messages mean the
// token parsed but its signature (or declared algorithm) is not acceptable.
const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function toTokenError(err: unknown): TokenError {
  if (err instanceof jwt.JsonWebTokenError) {
    return SIGNATURE_FAILURES.has(err.message)
      ? new TokenError('SIGNATURE_INVALID', err.message)
      : new TokenError('MALFORMED', err.message);
  }

  throw err;
}

export class TokenCodec {
  readonly clockSkewSeconds: number;

  constructor(private readonly opts: TokenCodecOptions) {
    this.clockSkewSeconds = opts.clockSkewSeconds ?? 0;
  }

  /**
   * Seconds a token of this purpose stays valid. Throws ConfigError when the
   * purpose has no configured lifetime.
   */
  lifetimeOf(purpose: TokenPurpose): number {
    const lifetime = this.opts.lifetimes[purpose];
    if (lifetime === undefined || lifetime <= 0) {
      throw new ConfigError(`No lifetime configured for ${purpose} tokens`);
    }
    return lifetime;
  }

  /**
   * Last second (inclusive) at which verify() still accepts a token expiring at `expiresAt`.
   */
  acceptedUntil(expiresAt: number): number {
    return expiresAt + this.clockSkewSeconds;
  }

  issue(subject: string, purpose: TokenPurpose, now: Date): IssuedToken {
    const lifetime = this.lifetimeOf(purpose);

    const issuedAt = toEpochSeconds(now);
    const claims: TokenClaims = {
      sub: subject,
      purpose,
      jti: generateSecureToken(NONCE_BYTES),
      iat: issuedAt,
      iat_ms: now.getTime(),
      exp: issuedAt + lifetime,
    };

    const token = jwt.sign(claims, this.opts.key.secret, { algorithm: this.opts.key.algorithm });

    return {
      token,
      subject,
      purpose,
      nonce: claims.jti,
      issuedAt: claims.iat,
      issuedAtMs: claims.iat_ms,
      expiresAt: claims.exp,
    };
  }

  verify(raw: string, now: Date): VerifiedToken {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(raw, this.opts.key.secret, {
        algorithms: [this.opts.key.algorithm],
        ignoreExpiration: true,
      });
    } catch (err) {
      throw toTokenError(err);
    }

    const parsed = TokenClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new TokenError('MALFORMED', 'Token claims do not match the expected shape');
    }

    const claims = parsed.data;
    if (Math.floor(claims.iat_ms / 1000) !== claims.iat) {
      throw new TokenError('MALFORMED', 'Token issue times disagree');
    }
    if (toEpochSeconds(now) > this.acceptedUntil(claims.exp)) {
      throw new TokenError('EXPIRED', 'Token has expired');
    }

    return {
      subject: claims.sub,
      purpose: claims.purpose,
      nonce: claims.jti,
      issuedAt: claims.iat,
      issuedAtMs: claims.iat_ms,
      expiresAt: claims.exp,
    };
  }
}
