import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { createTestDb } from './test-db';

export const TEST_JWT_SECRET = 'test-secret-key-123';

export const baseTestConfig: AppConfig = {
  nodeEnv: 'test',
  port: 0,

  databaseUrl: 'sqlite::memory:',
  redisUrl: null,

  logLevel: 'error',
  serviceName: 'blog-platform-backend',
  appName: 'Blog Platform API',
  publicBaseUrl: 'http://localhost:3000',

  // Lowest cost bcrypt accepts; production config enforces >= 10.
  bcryptCost: 4,

  jwt: {
    secret: TEST_JWT_SECRET,
    algorithm: 'HS256',
    accessTokenTtlMinutes: 30,
    resetTokenTtlHours: 24,
  },

  smtp: {
    host: null,
    port: 587,
    user: null,
    password: null,
    fromEmail: 'no-reply@example.com',
    fromName: 'Blog Platform',
  },

  corsOrigins: ['http://localhost:8000'],

  rateLimit: {
    enabled: false,
    requests: 100,
    periodSeconds: 60,
  },
};

type TestConfigOverrides = Partial<Omit<AppConfig, 'rateLimit'>> & {
  rateLimit?: Partial<AppConfig['rateLimit']>;
};

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Fresh in-memory SQLite database per app, so tests never share rows.
 * - Rate limiting is OFF unless a test turns it on.
 * - Emails land in an InMemQueue; tests read them with queue.drain().
 */
export async function buildTestApp(overrides: TestConfigOverrides = {}) {
  const config: AppConfig = {
    ...baseTestConfig,
    ...overrides,
    // ensure nested objects merge correctly
    rateLimit: {
      ...baseTestConfig.rateLimit,
      ...(overrides.rateLimit ?? {}),
    },
  };

  const db = await createTestDb();
  const queue = new InMemQueue();

  const built = await buildApp(config, { db, queue, cache: new InMemCache() });

  return {
    app: built.app,
    deps: built.deps,
    db,
    queue,
    close: built.close,
  };
}

export type TestApp = Awaited<ReturnType<typeof buildTestApp>>;
