/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, mail) and shares them safely.
 * - Tests pass `overrides` to swap infra for in-process fakes.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (mail transport, rate limits on/off) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { TokenCodec } from '../shared/security/token-codec';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import { SmtpEmailQueue } from '../shared/messaging/smtp-email-queue';
import type { Queue } from '../shared/messaging/queue';

import { createUserModule, KyselyCredentialStore, type CredentialStore } from '../modules/users';
import type { UserModule } from '../modules/users';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  cache: Cache;
  credentialStore: CredentialStore;
  queue: Queue;

  logger: Logger;

  codec: TokenCodec;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  // modules
  users: UserModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

/** Infra that tests replace with in-process fakes. Anything omitted is built from config. */
export type DepsOverrides = Partial<{
  cache: Cache;
  credentialStore: CredentialStore;
  queue: Queue;
  passwordHasher: PasswordHasher;
}>;

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const closers: Array<() => Promise<void> | void> = [];

  let credentialStore = overrides.credentialStore;
  if (!credentialStore) {
    const db = createDb({ databaseUrl: config.databaseUrl, connectTimeoutMs: config.storeTimeoutMs });
    closers.push(() => db.destroy());
    credentialStore = new KyselyCredentialStore(db, { timeoutMs: config.storeTimeoutMs });
  }

  let cache = overrides.cache;
  if (!cache) {
    // Redis is mandatory outside tests
    const redis = await RedisCache.connect({
      host: config.redis.host,
      port: config.redis.port,
      timeoutMs: config.cacheTimeoutMs,
    });
    closers.push(() => redis.close());
    cache = redis;
  }

  let queue = overrides.queue;
  if (!queue) {
    if (config.mail.smtp) {
      const smtp = new SmtpEmailQueue({
        smtp: config.mail.smtp,
        from: config.mail.from,
        appBaseUrl: config.mail.appBaseUrl,
        timeoutMs: config.mailTimeoutMs,
      });
      closers.push(() => smtp.close());
      queue = smtp;
    } else {
      logger.warn('mail.smtp_not_configured', {
        flow: 'di',
        message: 'SMTP_HOST is not set; verification emails stay in-process',
      });
      queue = new InMemQueue(logger);
    }
  }

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Secret is read once here; nothing else sees the raw config.
  const codec = new TokenCodec({
    key: { algorithm: config.jwt.algorithm, secret: config.jwt.secret },
    lifetimes: config.tokenLifetimes,
    clockSkewSeconds: config.jwt.clockSkewSeconds,
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ credentialStore });

  const auth = createAuthModule({
    cache,
    credentialStore,
    passwordHasher,
    tokenHasher,
    codec,
    queue,
    logger,
    rateLimits: config.rateLimits,
    options: {
      rotateRefreshTokens: config.rotateRefreshTokens,
      requireVerifiedEmail: config.requireVerifiedEmail,
    },
  });

  return {
    cache,
    credentialStore,
    queue,
    logger,
    codec,
    tokenHasher,
    passwordHasher,
    users,
    auth,
    close: async () => {
      for (const close of closers.reverse()) await close();
    },
  };
}
