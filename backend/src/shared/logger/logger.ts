/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) for log querying.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs (or take `Logger` as a dependency).
 * - Prefer using `withRequestContext(req)` when logging inside request handlers.
 * - Do not log raw Error objects only; pass `{ err }` so stack/message is preserved.
 *
 * NOTE:
 * - Logging bootstrap is the one place allowed to read process.env directly:
 *   it must work before (and if) config parsing fails.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'blog-platform-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;
