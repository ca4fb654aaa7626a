import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

type TestApp = Awaited<ReturnType<typeof buildTestApp>>['app'];
type TokenPairBody = { accessToken: string; refreshToken: string; tokenType: string };

const EMAIL = 'alice@example.com';
const PASSWORD = 'correct-horse-battery';
const AUTH_FAILED = { error: { code: 'UNAUTHORIZED', message: 'Authentication failed.' } };

function register(app: TestApp, email = EMAIL, password = PASSWORD) {
  return app.inject({ method: 'POST', url: '/auth/register', payload: { email, password } });
}

function login(app: TestApp, password = PASSWORD, email = EMAIL) {
  return app.inject({ method: 'POST', url: '/auth/login', payload: { email, password } });
}

describe('POST /auth/login', () => {
  it('returns a bearer token pair', async () => {
    const { app, close } = await buildTestApp();
    try {
      await register(app);
      const res = await login(app);

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        accessToken: expect.any(String),
        refreshToken: expect.any(String),
        tokenType: 'Bearer',
      });
    } finally {
      await close();
    }
  });

  it('answers the same 401 for an unknown email and a wrong password', async () => {
    const { app, close } = await buildTestApp();
    try {
      await register(app);
      const unknown = await login(app, PASSWORD, 'bob@example.com');
      const wrong = await login(app, 'wrong-password');

      expect(unknown.statusCode).toBe(401);
      expect(wrong.statusCode).toBe(401);
      expect(unknown.json()).toEqual(AUTH_FAILED);
      expect(wrong.json()).toEqual(AUTH_FAILED);
    } finally {
      await close();
    }
  });

  it('answers 429 with Retry-After once the account is throttled', async () => {
    const { app, close } = await buildTestApp();
    try {
      await register(app);
      for (let i = 0; i < 5; i++) {
        expect((await login(app, 'wrong-password')).statusCode).toBe(401);
      }

      const res = await login(app);

      expect(res.statusCode).toBe(429);
      const retryAfter = Number(res.headers['retry-after']);
      expect(retryAfter).toBeGreaterThan(0);
      expect(retryAfter).toBeLessThanOrEqual(900);
      expect(res.json()).toEqual({
        error: { code: 'RATE_LIMITED', message: 'Too many attempts. Try again later.' },
      });
    } finally {
      await close();
    }
  });

  it('does not throttle when rate limiting is disabled', async () => {
    const { app, close } = await buildTestApp({ env: { RATE_LIMIT_ENABLED: 'false' } });
    try {
      await register(app);
      for (let i = 0; i < 6; i++) {
        expect((await login(app, 'wrong-password')).statusCode).toBe(401);
      }

      expect((await login(app)).statusCode).toBe(200);
    } finally {
      await close();
    }
  });
});

describe('POST /auth/refresh and /auth/logout', () => {
  it('refreshes until logout revokes the refresh token', async () => {
    const { app, close } = await buildTestApp();
    try {
      await register(app);
      const pair = (await login(app)).json<TokenPairBody>();

      const refreshed = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: pair.refreshToken },
      });
      expect(refreshed.statusCode).toBe(200);
      expect(refreshed.json()).toEqual({ accessToken: expect.any(String), tokenType: 'Bearer' });

      const logout = await app.inject({
        method: 'POST',
        url: '/auth/logout',
        payload: { refreshToken: pair.refreshToken },
      });
      expect(logout.statusCode).toBe(204);
      expect(logout.body).toBe('');

      const after = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: pair.refreshToken },
      });
      expect(after.statusCode).toBe(401);
      expect(after.json()).toEqual(AUTH_FAILED);
    } finally {
      await close();
    }
  });

  it('rotates the refresh token when rotation is enabled', async () => {
    const { app, close } = await buildTestApp({ env: { REFRESH_TOKEN_ROTATION: 'true' } });
    try {
      await register(app);
      const pair = (await login(app)).json<TokenPairBody>();

      const res = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: pair.refreshToken },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json<TokenPairBody>().refreshToken).toEqual(expect.any(String));
      expect(res.json<TokenPairBody>().refreshToken).not.toBe(pair.refreshToken);
    } finally {
      await close();
    }
  });

  it('treats logout with an unusable token as a no-op', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/logout',
        payload: { refreshToken: 'not-a-token' },
      });

      expect(res.statusCode).toBe(204);
    } finally {
      await close();
    }
  });

  it('rejects an access token presented as a refresh token', async () => {
    const { app, close } = await buildTestApp();
    try {
      await register(app);
      const pair = (await login(app)).json<TokenPairBody>();

      const res = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: pair.accessToken },
      });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual(AUTH_FAILED);
    } finally {
      await close();
    }
  });
});
