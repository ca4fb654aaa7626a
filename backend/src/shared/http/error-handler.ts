/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError or infra errors.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, failure kind, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 *   (Every auth failure kind arrives here as the same 401.)
 * - ThrottledError → 429 + Retry-After.
 * - StoreUnavailableError / CacheUnavailableError → 503 (retryable).
 * - Zod errors and Fastify 4xx errors (bad JSON, wrong content type) → 400.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (with REDACTED meta) for observability.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { AppError, type AppErrorCode } from './errors';
import { ThrottledError } from '../security/rate-limit';
import { CacheUnavailableError, StoreUnavailableError } from '../errors/infra-errors';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: AppErrorCode;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'refreshToken',
  'verifyToken',
  'password',
  'currentPassword',
  'newPassword',
  'passwordHash',
  'secret',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: AppErrorCode, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors (incl. uniform auth failures)
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Throttled: distinct signal with a retry hint
    if (err instanceof ThrottledError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        retryAfterSeconds: err.retryAfterSeconds,
      });

      return reply
        .status(429)
        .header('retry-after', String(err.retryAfterSeconds))
        .send(buildResponse('RATE_LIMITED', 'Too many attempts. Try again later.'));
    }

    // 3) Dependencies down: retryable, never "authenticated"
    if (err instanceof StoreUnavailableError || err instanceof CacheUnavailableError) {
      log.error('dependency_unavailable', {
        flow: 'http.error',
        name: err.name,
        operation: err.operation,
        message: err.message,
      });

      return reply
        .status(503)
        .send(buildResponse('SERVICE_UNAVAILABLE', 'Service temporarily unavailable. Please retry.'));
    }

    // 4) Validation safety net (controller missed it, or Fastify rejected the body)
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
      log.warn('request_error', { flow: 'http.error', code: err.code, message: err.message });
      return reply.status(err.statusCode).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 5) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
