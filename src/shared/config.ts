import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

loadDotenv();

const csv = z
  .string()
  .transform((value) => value.split(',').map((entry) => entry.trim()).filter(Boolean));

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  JWT_SECRET: z.string().min(16).default('dev-only-signing-secret-change-me'),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(900),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().min(0).default(0),
  API_KEY_HEADER: z.string().min(1).default('x-api-key'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(500),
  STORE_FAILURE_POLICY: z.enum(['open', 'closed']).default('closed'),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_KEY: z.enum(['identity', 'ip']).default('identity'),
  REGISTRATION_ROLES: csv.default('user'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  // Explicit allowlist; never '*' with credentials
  CORS_ALLOWED_ORIGINS: csv.optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const parsed = environmentSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration', parsed.error.format());
  throw new Error('Invalid environment configuration');
}

const env = parsed.data;

export type StoreFailurePolicy = 'open' | 'closed';
export type RateLimitKey = 'identity' | 'ip';

export interface GatewaySettings {
  port: number;
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  clockToleranceSeconds: number;
  apiKeyHeader: string;
  redisUrl: string;
  storeTimeoutMs: number;
  storeFailurePolicy: StoreFailurePolicy;
  rateLimitMax: number;
  rateLimitWindowSeconds: number;
  rateLimitKey: RateLimitKey;
  registrationRoles: string[];
  bcryptRounds: number;
  corsAllowedOrigins: string[];
}

export const config = {
  gateway: {
    port: env.PORT,
    jwtSecret: env.JWT_SECRET,
    accessTokenTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: env.REFRESH_TOKEN_TTL_SECONDS,
    clockToleranceSeconds: env.CLOCK_TOLERANCE_SECONDS,
    apiKeyHeader: env.API_KEY_HEADER.toLowerCase(),
    redisUrl: env.REDIS_URL,
    storeTimeoutMs: env.STORE_TIMEOUT_MS,
    storeFailurePolicy: env.STORE_FAILURE_POLICY,
    rateLimitMax: env.RATE_LIMIT_MAX,
    rateLimitWindowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
    rateLimitKey: env.RATE_LIMIT_KEY,
    registrationRoles: env.REGISTRATION_ROLES,
    bcryptRounds: env.BCRYPT_ROUNDS,
    corsAllowedOrigins:
      env.CORS_ALLOWED_ORIGINS ??
      (env.NODE_ENV === 'test' ? ['http://localhost:3000', 'https://trusted.example.com'] : []),
  } satisfies GatewaySettings,
  logLevel: env.LOG_LEVEL,
  isTest: env.NODE_ENV === 'test',
};
