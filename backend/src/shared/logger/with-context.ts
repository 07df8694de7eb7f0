/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId + userId so we can trace a full request.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export function withRequestContext(req: FastifyRequest) {
  const base = {
    requestId: req.requestContext?.requestId,
    method: req.method,
    url: req.url,
    userId: req.authContext?.userId ?? null,
  };

  return {
    info: (msg: string, meta: LogMeta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg: string, meta: LogMeta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg: string, meta: LogMeta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg: string, meta: LogMeta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
