/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - A caller-supplied x-request-id is honoured so traces can span services.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

function pickRequestId(raw: unknown): string {
  if (typeof raw === 'string' && REQUEST_ID_PATTERN.test(raw)) return raw;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null, []);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    req.requestContext = {
      requestId: pickRequestId(req.headers['x-request-id']),
    };
    void reply.header('x-request-id', req.requestContext.requestId);

    done();
  });
}
