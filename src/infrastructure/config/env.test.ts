import { describe, it, expect } from 'vitest';
import { loadConfig } from './env';

describe('loadConfig', () => {
  it('applies defaults for local development', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      isProduction: false,
      port: 3000,
      storage: { driver: 'redis', redisUrl: 'redis://localhost:6379' },
      sessionTtlSeconds: 604800,
      bcryptRounds: 10,
    });
  });

  it('reads explicit values', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      REDIS_URL: 'rediss://cache.example.com:6380',
      SESSION_TTL_SECONDS: '3600',
      BCRYPT_ROUNDS: '12',
    });

    expect(config.isProduction).toBe(true);
    expect(config.port).toBe(8080);
    expect(config.storage).toEqual({ driver: 'redis', redisUrl: 'rediss://cache.example.com:6380' });
    expect(config.sessionTtlSeconds).toBe(3600);
    expect(config.bcryptRounds).toBe(12);
  });

  it('does not need redis for the memory driver', () => {
    expect(loadConfig({ NODE_ENV: 'production', STORAGE_DRIVER: 'memory' }).storage).toEqual({ driver: 'memory' });
  });

  it('requires REDIS_URL in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('REDIS_URL environment variable must be set');
  });

  it('falls back to local redis when asked to', () => {
    expect(loadConfig({ NODE_ENV: 'test', USE_LOCAL_REDIS: 'true' }).storage).toEqual({
      driver: 'redis',
      redisUrl: 'redis://localhost:6379',
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid environment configuration: PORT/);
    expect(() => loadConfig({ STORAGE_DRIVER: 'postgres' })).toThrow(/STORAGE_DRIVER/);
  });
});
