import { buildApp } from '../../src/app/build-app';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import type { Cache } from '../../src/shared/cache/cache';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import type { PasswordHasher } from '../../src/shared/security/password-hasher';
import { FakePasswordHasher } from './fake-password-hasher';
import { InMemCredentialStore } from './in-mem-credential-store';
import { buildTestConfig } from './test-config';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Nothing leaves the process: cache, credential store and mail are in-memory fakes.
 * - `env` overrides individual environment variables (parsed by the real buildConfig).
 */
export async function buildTestApp(
  opts: {
    env?: Record<string, string>;
    cache?: Cache;
    passwordHasher?: PasswordHasher;
  } = {},
) {
  const config = buildTestConfig(opts.env);

  const cache = opts.cache ?? new InMemCache();
  const credentialStore = new InMemCredentialStore();
  const queue = new InMemQueue();

  const built = await buildApp(config, {
    cache,
    credentialStore,
    queue,
    passwordHasher: opts.passwordHasher ?? new FakePasswordHasher(),
  });

  return {
    app: built.app,
    deps: built.deps,
    config,
    cache,
    credentialStore,
    queue,
    close: built.close,
  };
}
