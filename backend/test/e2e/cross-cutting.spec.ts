import { afterEach, describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import type { TestApp } from '../helpers/build-test-app';
import type { ErrorBody } from '../helpers/api';

describe('http cross-cutting behaviour', () => {
  let t: TestApp | undefined;

  afterEach(async () => {
    await t?.close();
    t = undefined;
  });

  describe('rate limiting', () => {
    it('rejects requests beyond the per-client budget with 429', async () => {
      t = await buildTestApp({ rateLimit: { enabled: true, requests: 2 } });

      const first = await t.app.inject({ method: 'GET', url: '/health' });
      const second = await t.app.inject({ method: 'GET', url: '/health' });
      const third = await t.app.inject({ method: 'GET', url: '/health' });

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(200);
      expect(third.statusCode).toBe(429);
      expect(third.json<ErrorBody>()).toEqual({
        error: { code: 'RATE_LIMITED', message: 'Too many requests. Try again later.' },
      });
    });

    it('does not limit when disabled', async () => {
      t = await buildTestApp({ rateLimit: { enabled: false, requests: 1 } });

      await t.app.inject({ method: 'GET', url: '/health' });
      const res = await t.app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
    });
  });

  describe('cors', () => {
    it('answers a preflight from an allowed origin', async () => {
      t = await buildTestApp();

      const res = await t.app.inject({
        method: 'OPTIONS',
        url: '/posts',
        headers: {
          origin: 'http://localhost:8000',
          'access-control-request-method': 'POST',
        },
      });

      expect(res.statusCode).toBe(204);
      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:8000');
      expect(res.headers['access-control-allow-credentials']).toBe('true');
      expect(res.headers['access-control-allow-methods']).toBe('GET, POST, PUT, DELETE, OPTIONS');
    });

    it('refuses a preflight from an unknown origin', async () => {
      t = await buildTestApp();

      const res = await t.app.inject({
        method: 'OPTIONS',
        url: '/posts',
        headers: {
          origin: 'http://evil.example',
          'access-control-request-method': 'POST',
        },
      });

      expect(res.statusCode).toBe(403);
      expect(res.headers['access-control-allow-origin']).toBeUndefined();
    });

    it('echoes an allowed origin on simple requests', async () => {
      t = await buildTestApp();

      const res = await t.app.inject({
        method: 'GET',
        url: '/health',
        headers: { origin: 'http://localhost:8000' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:8000');
      expect(res.headers.vary).toBe('Origin');
    });
  });

  describe('error responses', () => {
    it('maps a malformed JSON body to 400', async () => {
      t = await buildTestApp();

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/signin',
        headers: { 'content-type': 'application/json' },
        payload: '{"email":',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error.code).toBe('VALIDATION_ERROR');
    });

    it('asks for a bearer token on 401', async () => {
      t = await buildTestApp();

      const res = await t.app.inject({ method: 'GET', url: '/auth/me' });

      expect(res.statusCode).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
    });
  });
});
