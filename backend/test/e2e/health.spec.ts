import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

describe('GET /health', () => {
  it('reports service identity and a request id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json<{ ok: boolean; env: string; service: string; requestId: string }>();
      expect(body.ok).toBe(true);
      expect(body.env).toBe('test');
      expect(body.service).toBe('contacts-api');
      expect(body.requestId).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await close();
    }
  });

  it('keeps a well-formed upstream request id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'edge-req-0001' },
      });

      expect(res.json<{ requestId: string }>().requestId).toBe('edge-req-0001');
    } finally {
      await close();
    }
  });
});
