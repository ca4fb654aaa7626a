/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/auth/register', controller.register.bind(controller));
  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/refresh', controller.refresh.bind(controller));
  app.post('/auth/logout', controller.logout.bind(controller));

  app.post('/auth/verify-email', controller.verifyEmail.bind(controller));
  app.get('/auth/verify-email', controller.verifyEmailFromLink.bind(controller));
  app.post('/auth/verify-email/request', controller.requestVerificationEmail.bind(controller));

  // Requires a bearer access token
  app.post('/auth/change-password', controller.changePassword.bind(controller));
}
