import { z } from 'zod';

const isTest = process.env.NODE_ENV === 'test';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  JWT_SECRET: z.string().min(16).default('test-secret-key-for-local-tokens'),
  JWT_ISSUER: z.string().min(1).default('barbershop-api'),
  JWT_AUDIENCE: z.string().min(1).default('barbershop-clients'),
  ACCESS_TOKEN_TTL_SECONDS: positiveInt.default(300),
  REFRESH_TOKEN_TTL_SECONDS: positiveInt.default(7 * 24 * 3600),
  STORE_BACKEND: z.enum(['memory', 'redis']).default(isTest ? 'memory' : 'redis'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  STORE_TIMEOUT_MS: positiveInt.default(2000),
  // bcryptjs accepts 4..31
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(31).default(isTest ? 4 : 12),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default(isTest ? 'silent' : 'info'),
  SLOW_REQUEST_MS: positiveInt.default(2000),
});

export type Env = z.input<typeof envSchema>;

export function loadConfig(env: Record<string, string | undefined>) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    api: {
      port: e.PORT,
      slowRequestMs: e.SLOW_REQUEST_MS,
    },
    jwt: {
      secret: e.JWT_SECRET,
      issuer: e.JWT_ISSUER,
      audience: e.JWT_AUDIENCE,
      accessTokenTtlSeconds: e.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: e.REFRESH_TOKEN_TTL_SECONDS,
    },
    store: {
      backend: e.STORE_BACKEND,
      redisUrl: e.REDIS_URL,
      timeoutMs: e.STORE_TIMEOUT_MS,
    },
    passwords: {
      bcryptRounds: e.BCRYPT_ROUNDS,
    },
    log: {
      level: e.LOG_LEVEL,
    },
    isTest,
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig(process.env);
