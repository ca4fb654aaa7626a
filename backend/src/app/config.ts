/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime: anything missing or invalid is a
 *   ConfigError at startup (index.ts exits 1), never a surprise mid-request.
 *
 * HOW TO USE:
 * - In dev, backend/.env is loaded via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests call buildConfig({...}) with an explicit env object.
 *
 * TYPING:
 * - nodeEnv and jwt.algorithm are unions, so invalid values ('prod', 'RS256')
 *   are caught by Zod rather than silently falling through.
 */

import 'dotenv/config';
import { z } from 'zod';

import { ConfigError } from '../shared/errors/infra-errors';
import {
  SIGNING_ALGORITHMS,
  type SigningAlgorithm,
  type TokenLifetimes,
} from '../shared/security/token-codec';
import type { RateLimitPolicy } from '../shared/security/rate-limit';
import { AUTH_RATE_LIMIT_SCOPES } from '../modules/auth/auth.constants';
import type { AuthRateLimitPolicies } from '../modules/auth/auth.module';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() would read "false" as true.
const BooleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const seconds = (fallback: number) => z.coerce.number().int().min(1).default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('contacts-api'),

  // Infra
  DATABASE_URL: z.string().min(1),
  REDIS_HOST: z.string().min(1),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535),

  // Tokens
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  JWT_ALGORITHM: z.enum(SIGNING_ALGORITHMS),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(1),
  REFRESH_TOKEN_TTL_SECONDS: seconds(7 * 24 * 60 * 60),
  EMAIL_VERIFY_TOKEN_TTL_SECONDS: seconds(7 * 24 * 60 * 60),
  TOKEN_CLOCK_SKEW_SECONDS: z.coerce.number().int().min(0).max(300).default(0),
  REFRESH_TOKEN_ROTATION: BooleanFlag,
  REQUIRE_VERIFIED_EMAIL: BooleanFlag,

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // Rate limits
  RATE_LIMIT_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
  LOGIN_ACCOUNT_MAX_FAILURES: positiveInt(5),
  LOGIN_ACCOUNT_WINDOW_SECONDS: seconds(900),
  LOGIN_ADDRESS_MAX_FAILURES: positiveInt(20),
  LOGIN_ADDRESS_WINDOW_SECONDS: seconds(900),
  REGISTER_ADDRESS_MAX_ATTEMPTS: positiveInt(10),
  REGISTER_ADDRESS_WINDOW_SECONDS: seconds(3600),
  VERIFY_REQUEST_MAX_ATTEMPTS: positiveInt(3),
  VERIFY_REQUEST_WINDOW_SECONDS: seconds(3600),

  // Per-call timeouts
  CACHE_TIMEOUT_MS: positiveInt(500),
  STORE_TIMEOUT_MS: positiveInt(2000),
  MAIL_TIMEOUT_MS: positiveInt(5000),

  // Outbound mail (optional: without SMTP_HOST, mail stays in-process)
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_SECURE: BooleanFlag,
  SMTP_USER: z.string().min(1).optional(),
  SMTP_PASSWORD: z.string().min(1).optional(),
  MAIL_FROM: z.string().min(1).default('no-reply@localhost'),
  APP_BASE_URL: z.string().url().default('http://localhost:3000'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = Readonly<{
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  databaseUrl: string;
  redis: { host: string; port: number };

  jwt: {
    secret: string;
    algorithm: SigningAlgorithm;
    clockSkewSeconds: number;
  };
  tokenLifetimes: Required<TokenLifetimes>;
  rotateRefreshTokens: boolean;
  requireVerifiedEmail: boolean;

  bcryptCost: number;

  rateLimits: AuthRateLimitPolicies;

  cacheTimeoutMs: number;
  storeTimeoutMs: number;
  mailTimeoutMs: number;

  mail: {
    smtp: {
      host: string;
      port: number;
      secure: boolean;
      user: string | null;
      password: string | null;
    } | null;
    from: string;
    appBaseUrl: string;
  };
}>;

function policy(
  scope: string,
  threshold: number,
  windowSeconds: number,
  enabled: boolean,
): RateLimitPolicy {
  return { scope, threshold, windowSeconds, enabled };
}

/**
 * Parses and validates the environment once. Throws ConfigError listing every
 * offending variable (never their values).
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  const limitsOn = parsed.RATE_LIMIT_ENABLED;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    databaseUrl: parsed.DATABASE_URL,
    redis: { host: parsed.REDIS_HOST, port: parsed.REDIS_PORT },

    jwt: {
      secret: parsed.JWT_SECRET,
      algorithm: parsed.JWT_ALGORITHM,
      clockSkewSeconds: parsed.TOKEN_CLOCK_SKEW_SECONDS,
    },
    tokenLifetimes: {
      access: parsed.ACCESS_TOKEN_TTL_SECONDS,
      refresh: parsed.REFRESH_TOKEN_TTL_SECONDS,
      email_verify: parsed.EMAIL_VERIFY_TOKEN_TTL_SECONDS,
    },
    rotateRefreshTokens: parsed.REFRESH_TOKEN_ROTATION,
    requireVerifiedEmail: parsed.REQUIRE_VERIFIED_EMAIL,

    bcryptCost: parsed.BCRYPT_COST,

    rateLimits: {
      loginAccount: policy(
        AUTH_RATE_LIMIT_SCOPES.loginAccount,
        parsed.LOGIN_ACCOUNT_MAX_FAILURES,
        parsed.LOGIN_ACCOUNT_WINDOW_SECONDS,
        limitsOn,
      ),
      loginAddress: policy(
        AUTH_RATE_LIMIT_SCOPES.loginAddress,
        parsed.LOGIN_ADDRESS_MAX_FAILURES,
        parsed.LOGIN_ADDRESS_WINDOW_SECONDS,
        limitsOn,
      ),
      registerAddress: policy(
        AUTH_RATE_LIMIT_SCOPES.registerAddress,
        parsed.REGISTER_ADDRESS_MAX_ATTEMPTS,
        parsed.REGISTER_ADDRESS_WINDOW_SECONDS,
        limitsOn,
      ),
      verifyRequest: policy(
        AUTH_RATE_LIMIT_SCOPES.verifyRequest,
        parsed.VERIFY_REQUEST_MAX_ATTEMPTS,
        parsed.VERIFY_REQUEST_WINDOW_SECONDS,
        limitsOn,
      ),
    },

    cacheTimeoutMs: parsed.CACHE_TIMEOUT_MS,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,
    mailTimeoutMs: parsed.MAIL_TIMEOUT_MS,

    mail: {
      smtp: parsed.SMTP_HOST
        ? {
            host: parsed.SMTP_HOST,
            port: parsed.SMTP_PORT,
            secure: parsed.SMTP_SECURE,
            user: parsed.SMTP_USER ?? null,
            password: parsed.SMTP_PASSWORD ?? null,
          }
        : null,
      from: parsed.MAIL_FROM,
      appBaseUrl: parsed.APP_BASE_URL,
    },
  };
}
