import { describe, it, expect } from 'vitest';
import { verifyEmailLink } from '../../src/shared/messaging/smtp-email-queue';
import { buildTestApp } from '../helpers/build-test-app';

type Built = Awaited<ReturnType<typeof buildTestApp>>;

const EMAIL = 'alice@example.com';
const PASSWORD = 'correct-horse-battery';
const REQUEST_RESPONSE = {
  message: 'If an unverified account with that email exists, a verification link has been sent.',
};

async function registerAndTakeToken({ app, queue }: Built): Promise<string> {
  await app.inject({
    method: 'POST',
    url: '/auth/register',
    payload: { email: EMAIL, password: PASSWORD },
  });
  const [message] = queue.drain();
  if (!message) throw new Error('no verification mail was enqueued');
  return message.verifyToken;
}

function confirm({ app }: Built, token: string) {
  return app.inject({ method: 'POST', url: '/auth/verify-email', payload: { token } });
}

function requestMail({ app }: Built, email: string) {
  return app.inject({ method: 'POST', url: '/auth/verify-email/request', payload: { email } });
}

describe('email verification', () => {
  it('confirms a principal with the mailed token, once', async () => {
    const built = await buildTestApp();
    try {
      const token = await registerAndTakeToken(built);

      const first = await confirm(built, token);
      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({ message: 'Email verified.' });
      expect(built.credentialStore.all()[0]?.verified).toBe(true);

      const second = await confirm(built, token);
      expect(second.statusCode).toBe(401);
    } finally {
      await built.close();
    }
  });

  it('confirms a principal through the mailed link', async () => {
    const built = await buildTestApp();
    try {
      const token = await registerAndTakeToken(built);
      const link = new URL(verifyEmailLink(built.config.mail.appBaseUrl, token));

      const res = await built.app.inject({ method: 'GET', url: `${link.pathname}${link.search}` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ message: 'Email verified.' });
      expect(built.credentialStore.all()[0]?.verified).toBe(true);
    } finally {
      await built.close();
    }
  });

  it('rejects a link without a token', async () => {
    const built = await buildTestApp();
    try {
      const res = await built.app.inject({ method: 'GET', url: '/auth/verify-email' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
    } finally {
      await built.close();
    }
  });

  it('supersedes the previous token when a new email is requested', async () => {
    const built = await buildTestApp();
    try {
      const oldToken = await registerAndTakeToken(built);

      const res = await requestMail(built, EMAIL);
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(REQUEST_RESPONSE);
      const [message] = built.queue.drain();
      if (!message) throw new Error('no verification mail was enqueued');

      expect((await confirm(built, oldToken)).statusCode).toBe(401);
      expect((await confirm(built, message.verifyToken)).statusCode).toBe(200);
    } finally {
      await built.close();
    }
  });

  it('answers an unknown email exactly like a known one', async () => {
    const built = await buildTestApp();
    try {
      const res = await requestMail(built, 'nobody@example.com');

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(REQUEST_RESPONSE);
      expect(built.queue.drain()).toEqual([]);
    } finally {
      await built.close();
    }
  });

  it('gates login on a verified email when required', async () => {
    const built = await buildTestApp({ env: { REQUIRE_VERIFIED_EMAIL: 'true' } });
    try {
      const token = await registerAndTakeToken(built);
      const credentials = { email: EMAIL, password: PASSWORD };

      const before = await built.app.inject({ method: 'POST', url: '/auth/login', payload: credentials });
      expect(before.statusCode).toBe(401);

      await confirm(built, token);

      const after = await built.app.inject({ method: 'POST', url: '/auth/login', payload: credentials });
      expect(after.statusCode).toBe(200);
    } finally {
      await built.close();
    }
  });
});
