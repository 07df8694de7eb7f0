/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - RateLimitError → 429 response.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (bad JSON, wrong content type) → their 4xx status.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses. Validation failures carry
 *   `details` (field path + message) and nothing more.
 * - Log full error details (including REDACTED meta) for observability.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError, toFieldIssues } from './errors';
import type { FieldIssue } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    details?: FieldIssue[];
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'resetToken',
  'password',
  'oldPassword',
  'newPassword',
  'passwordHash',
  'secret',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string, details?: FieldIssue[]): ErrorResponseBody {
  return details ? { error: { code, message, details } } : { error: { code, message } };
}

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err)) return null;
  const status = err.statusCode;
  if (typeof status !== 'number') return null;
  return status >= 400 && status < 500 ? status : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      if (err.status === 401) void reply.header('www-authenticate', 'Bearer');
      return reply.status(err.status).send(buildResponse(err.code, err.message, err.details));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Validation that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply
        .status(400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request', toFieldIssues(err.issues)));
    }

    // 4) Fastify client errors (malformed JSON body, unsupported media type, ...)
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', { flow: 'http.error', status, message: err.message });
      return reply.status(status).send(buildResponse('VALIDATION_ERROR', err.message));
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
