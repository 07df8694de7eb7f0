import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  ok: z.boolean(),
  env: z.string(),
  service: z.string(),
  requestId: z.string(),
});

describe('GET /health', () => {
  it('returns ok payload with a generated request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed.ok).toBe(true);
      expect(parsed.env).toBe('test');
      expect(parsed.service).toBe('blog-platform-backend');
      expect(res.headers['x-request-id']).toBe(parsed.requestId);
    } finally {
      await close();
    }
  });

  it('echoes a well-formed caller request id and replaces a bad one', async () => {
    const { app, close } = await buildTestApp();

    try {
      const echoed = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'trace-abc-123' },
      });
      expect(echoed.headers['x-request-id']).toBe('trace-abc-123');

      const replaced = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'bad id!' },
      });
      expect(replaced.headers['x-request-id']).not.toBe('bad id!');
    } finally {
      await close();
    }
  });
});
