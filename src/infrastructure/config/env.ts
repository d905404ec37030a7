import { z } from 'zod';

const LOCAL_REDIS_URL = 'redis://localhost:6379';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  STORAGE_DRIVER: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().url().optional(),
  USE_LOCAL_REDIS: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  isProduction: boolean;
  port: number;
  storage: { driver: 'memory' } | { driver: 'redis'; redisUrl: string };
  sessionTtlSeconds: number;
  bcryptRounds: number;
}

/**
 * Reads the configuration from the environment. Throws on the first
 * invalid or missing value so the process never starts half-configured.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  let storage: AppConfig['storage'];
  if (values.STORAGE_DRIVER === 'memory') {
    storage = { driver: 'memory' };
  } else {
    const useLocalRedis = values.USE_LOCAL_REDIS || (values.NODE_ENV === 'development' && !values.REDIS_URL);
    const redisUrl = values.REDIS_URL || (useLocalRedis ? LOCAL_REDIS_URL : undefined);
    if (!redisUrl) {
      throw new Error('REDIS_URL environment variable must be set');
    }
    storage = { driver: 'redis', redisUrl };
  }

  return {
    nodeEnv: values.NODE_ENV,
    isProduction: values.NODE_ENV === 'production',
    port: values.PORT,
    storage,
    sessionTtlSeconds: values.SESSION_TTL_SECONDS,
    bcryptRounds: values.BCRYPT_ROUNDS,
  };
}
