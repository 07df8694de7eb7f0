/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The result is an immutable value built once in index.ts and handed to
 *   buildDeps(); modules never read process.env themselves.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const JwtAlgorithmSchema = z.enum(['HS256', 'HS384', 'HS512']).default('HS256');

// z.coerce.boolean() treats "false" as true; parse the literal instead.
const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1).optional(),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('blog-platform-backend'),
  APP_NAME: z.string().default('Blog Platform API'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Tokens
  JWT_SECRET: z.string().min(16),
  JWT_ALGORITHM: JwtAlgorithmSchema,
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(30),
  RESET_TOKEN_TTL_HOURS: z.coerce.number().int().min(1).max(72).default(24),

  // SMTP (optional: without a host, mail goes to nodemailer's JSON transport)
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.coerce.number().int().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  SMTP_FROM_EMAIL: z.string().email().default('no-reply@example.com'),
  SMTP_FROM_NAME: z.string().default('Blog Platform'),

  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:8000'),

  RATE_LIMIT_ENABLED: BooleanFlag.default('true'),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_PERIOD_SECONDS: z.coerce.number().int().min(1).default(60),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type JwtAlgorithm = z.infer<typeof JwtAlgorithmSchema>;

export type AppConfig = Readonly<{
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string | null;

  logLevel: string;
  serviceName: string;
  appName: string;
  publicBaseUrl: string;

  bcryptCost: number;

  jwt: Readonly<{
    secret: string;
    algorithm: JwtAlgorithm;
    accessTokenTtlMinutes: number;
    resetTokenTtlHours: number;
  }>;

  smtp: Readonly<{
    host: string | null;
    port: number;
    user: string | null;
    password: string | null;
    fromEmail: string;
    fromName: string;
  }>;

  corsOrigins: readonly string[];

  rateLimit: Readonly<{
    enabled: boolean;
    requests: number;
    periodSeconds: number;
  }>;
}>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL ?? null,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
    appName: parsed.APP_NAME,
    publicBaseUrl: parsed.PUBLIC_BASE_URL,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: Object.freeze({
      secret: parsed.JWT_SECRET,
      algorithm: parsed.JWT_ALGORITHM,
      accessTokenTtlMinutes: parsed.ACCESS_TOKEN_TTL_MINUTES,
      resetTokenTtlHours: parsed.RESET_TOKEN_TTL_HOURS,
    }),

    smtp: Object.freeze({
      host: parsed.SMTP_HOST ?? null,
      port: parsed.SMTP_PORT,
      user: parsed.SMTP_USER ?? null,
      password: parsed.SMTP_PASSWORD ?? null,
      fromEmail: parsed.SMTP_FROM_EMAIL,
      fromName: parsed.SMTP_FROM_NAME,
    }),

    corsOrigins: Object.freeze(
      parsed.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    ),

    rateLimit: Object.freeze({
      enabled: parsed.RATE_LIMIT_ENABLED,
      requests: parsed.RATE_LIMIT_REQUESTS,
      periodSeconds: parsed.RATE_LIMIT_PERIOD_SECONDS,
    }),
  });
}
