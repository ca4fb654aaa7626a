/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts
 * - Global request context (requestId, client IP) and bearer authentication are
 *   attached here, before any route runs.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerAuthContext(app, opts.deps.auth.authService);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', { method: req.method, url: req.url });
    done();
  });

  return app;
}
