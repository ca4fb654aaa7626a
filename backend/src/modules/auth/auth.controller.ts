/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Returns structured responses; tokens travel in the JSON body.
 *
 * RULES:
 * - No DB or cache access here.
 * - No business rules here.
 * - Anti-enumeration endpoints (verify-email/request) always answer the same way.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import {
  changePasswordSchema,
  loginSchema,
  refreshTokenSchema,
  registerSchema,
  verifyEmailRequestSchema,
  verifyEmailSchema,
} from './auth.schemas';
import {
  PASSWORD_CHANGED_RESPONSE,
  VERIFY_EMAIL_CONFIRMED_RESPONSE,
  VERIFY_EMAIL_REQUEST_RESPONSE,
} from './auth.constants';
import { AppError } from '../../shared/http/errors';
import { requireAuth } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(message, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  return parseInput(schema, body, 'Invalid request body');
}

function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.infer<T> {
  return parseInput(schema, query, 'Invalid query string');
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(registerSchema, req.body);

    const profile = await this.authService.register({
      email: body.email,
      password: body.password,
      ip: req.requestContext.clientIp,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(201).send({
      id: profile.id,
      email: profile.email,
      verified: profile.verified,
    });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(loginSchema, req.body);

    const result = await this.authService.login({
      email: body.email,
      password: body.password,
      ip: req.requestContext.clientIp,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(200).send(result);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(refreshTokenSchema, req.body);

    const result = await this.authService.refresh({
      refreshToken: body.refreshToken,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(refreshTokenSchema, req.body);

    await this.authService.logout({
      refreshToken: body.refreshToken,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(204).send();
  }

  async verifyEmail(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(verifyEmailSchema, req.body);

    await this.authService.confirmVerification({
      token: body.token,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(200).send(VERIFY_EMAIL_CONFIRMED_RESPONSE);
  }

  // The link mailed by the verification flow lands here.
  async verifyEmailFromLink(req: FastifyRequest, reply: FastifyReply) {
    const query = parseQuery(verifyEmailSchema, req.query);

    await this.authService.confirmVerification({
      token: query.token,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(200).send(VERIFY_EMAIL_CONFIRMED_RESPONSE);
  }

  async requestVerificationEmail(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(verifyEmailRequestSchema, req.body);

    await this.authService.requestVerificationEmail({
      email: body.email,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(200).send(VERIFY_EMAIL_REQUEST_RESPONSE);
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const { principalId } = requireAuth(req);
    const body = parseBody(changePasswordSchema, req.body);

    await this.authService.changePassword({
      principalId,
      currentPassword: body.currentPassword,
      newPassword: body.newPassword,
      requestId: req.requestContext.requestId,
      now: new Date(),
    });

    return reply.status(200).send(PASSWORD_CHANGED_RESPONSE);
  }
}
