import { describe, expect, it } from 'vitest';
import { buildConfig } from '../../../src/app/config';

const minimalEnv = {
  DATABASE_URL: 'postgres://localhost:5432/blog_test',
  JWT_SECRET: 'test-secret-key-123',
};

describe('buildConfig', () => {
  it('applies defaults for everything optional', () => {
    const config = buildConfig(minimalEnv);

    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.redisUrl).toBeNull();
    expect(config.bcryptCost).toBe(12);
    expect(config.jwt).toEqual({
      secret: 'test-secret-key-123',
      algorithm: 'HS256',
      accessTokenTtlMinutes: 30,
      resetTokenTtlHours: 24,
    });
    expect(config.smtp.host).toBeNull();
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:8000']);
    expect(config.rateLimit).toEqual({ enabled: true, requests: 100, periodSeconds: 60 });
  });

  it('parses overrides from the environment', () => {
    const config = buildConfig({
      ...minimalEnv,
      NODE_ENV: 'production',
      PORT: '8080',
      JWT_ALGORITHM: 'HS512',
      ACCESS_TOKEN_TTL_MINUTES: '15',
      CORS_ORIGINS: ' https://a.example.com , ,https://b.example.com',
      RATE_LIMIT_ENABLED: 'false',
      RATE_LIMIT_REQUESTS: '5',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.jwt.algorithm).toBe('HS512');
    expect(config.jwt.accessTokenTtlMinutes).toBe(15);
    expect(config.corsOrigins).toEqual(['https://a.example.com', 'https://b.example.com']);
    expect(config.rateLimit.enabled).toBe(false);
    expect(config.rateLimit.requests).toBe(5);
  });

  it('returns a frozen value', () => {
    const config = buildConfig(minimalEnv);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.jwt)).toBe(true);
  });

  it('rejects a missing or short JWT secret', () => {
    expect(() => buildConfig({ DATABASE_URL: minimalEnv.DATABASE_URL })).toThrow();
    expect(() => buildConfig({ ...minimalEnv, JWT_SECRET: 'short' })).toThrow();
  });

  it('rejects values outside the allowed sets', () => {
    expect(() => buildConfig({ ...minimalEnv, NODE_ENV: 'staging' })).toThrow();
    expect(() => buildConfig({ ...minimalEnv, JWT_ALGORITHM: 'none' })).toThrow();
    expect(() => buildConfig({ ...minimalEnv, BCRYPT_COST: '4' })).toThrow();
  });
});
