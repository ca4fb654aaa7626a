import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import {
  parseBearerToken,
  registerAuthContext,
  type AccessTokenAuthenticator,
} from '../../../../src/shared/http/auth-context';
import { registerErrorHandler } from '../../../../src/shared/http/error-handler';
import { registerRequestContext } from '../../../../src/shared/http/request-context';

const authenticator: AccessTokenAuthenticator = {
  authenticate(raw: string) {
    if (raw === 'good-token') return Promise.resolve({ principalId: 'principal-1' });
    if (raw === 'explode') return Promise.reject(new Error('unexpected'));
    return Promise.reject(AppError.unauthorized('Authentication failed.'));
  },
};

async function buildApp() {
  const app = Fastify({ logger: false });
  registerRequestContext(app);
  registerAuthContext(app, authenticator);
  registerErrorHandler(app);
  app.get('/whoami', (req) => ({ principalId: req.authContext.principalId }));
  await app.ready();
  return app;
}

describe('parseBearerToken', () => {
  it('extracts the token from a Bearer header', () => {
    expect(parseBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(parseBearerToken('bearer   abc')).toBe('abc');
  });

  it('ignores other schemes and malformed headers', () => {
    expect(parseBearerToken(undefined)).toBeNull();
    expect(parseBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(parseBearerToken('Bearer')).toBeNull();
    expect(parseBearerToken('Bearer a b')).toBeNull();
  });
});

describe('registerAuthContext', () => {
  it('authenticates a valid bearer token', async () => {
    const app = await buildApp();

    const res = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { authorization: 'Bearer good-token' },
    });

    expect(res.json()).toEqual({ principalId: 'principal-1' });
    await app.close();
  });

  it('leaves the request anonymous without a header or with a rejected token', async () => {
    const app = await buildApp();

    const anonymous = await app.inject({ method: 'GET', url: '/whoami' });
    const rejected = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { authorization: 'Bearer bad-token' },
    });

    expect(anonymous.json()).toEqual({ principalId: null });
    expect(rejected.statusCode).toBe(200);
    expect(rejected.json()).toEqual({ principalId: null });
    await app.close();
  });

  it('lets unexpected authenticator failures reach the error handler', async () => {
    const app = await buildApp();

    const res = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { authorization: 'Bearer explode' },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { code: 'INTERNAL', message: 'Internal server error' } });
    await app.close();
  });
});
