import { z } from 'zod';
import { randomBytes } from 'node:crypto';

const generateSecret = () => randomBytes(32).toString('base64url');

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const WEAK_SECRETS = new Set(['change-me', 'secret', 'changeme']);

export const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HTTP_PORT: z.coerce.number().int().positive().default(3000),
  HTTP_HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  TRUST_PROXY: booleanFlag,
  CORS_ALLOWED_ORIGINS: z.string().default(''),
  AUTH_COOKIE_SECURE: z.enum(['true', 'false']).default('true').transform((value) => value === 'true'),
  AUTH_COOKIE_DOMAIN: z.string().optional(),
  STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
  POSTGRES_URL: z.string().optional(),
  POSTGRES_POOL_MAX: z.coerce.number().int().positive().default(10),
  REDIS_URL: z.string().optional(),
  REDIS_KEY_PREFIX: z.string().default('identity'),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
  REVOCATION_FAILURE_MODE: z.enum(['open', 'closed']).default('closed'),
  JWT_SECRET: z.string().default(() => generateSecret()),
  JWT_ACTIVE_KID: z.string().default('primary'),
  JWT_SECONDARY_SECRET: z.string().optional(),
  JWT_SECONDARY_KID: z.string().optional(),
  JWT_SECONDARY_NOT_AFTER: z.coerce.number().int().positive().optional(),
  JWT_SIGNING_ALG: z.enum(['HS256']).default('HS256'),
  JWT_ROTATION_LEEWAY_SECONDS: z.coerce.number().int().nonnegative().default(300),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(15 * 60),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60),
  PASSWORD_RESET_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 60),
  EMAIL_VERIFICATION_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
  MFA_CHALLENGE_TTL_SECONDS: z.coerce.number().int().positive().default(5 * 60),
  REFRESH_PURGE_INTERVAL_SECONDS: z.coerce.number().int().nonnegative().default(60 * 60),
  MFA_CODE_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
  LOCKOUT_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  LOCKOUT_WINDOW_SECONDS: z.coerce.number().int().positive().default(15 * 60),
  RATE_LIMIT_POINTS: z.coerce.number().int().positive().default(20),
  RATE_LIMIT_DURATION_SECONDS: z.coerce.number().int().positive().default(60),
  ARGON2_MEMORY_COST: z.coerce.number().int().positive().default(19456),
  ARGON2_TIME_COST: z.coerce.number().int().positive().default(2),
  ARGON2_PARALLELISM: z.coerce.number().int().positive().default(1),
  REQUIRE_EMAIL_VERIFICATION_FOR_LOGIN: booleanFlag,
  ALLOW_PUBLIC_ROLE_REGISTRATION: booleanFlag
}).superRefine((cfg, ctx) => {
  if (cfg.STORAGE_DRIVER === 'postgres' && !cfg.POSTGRES_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['POSTGRES_URL'],
      message: 'POSTGRES_URL is required when STORAGE_DRIVER=postgres'
    });
  }
  if (cfg.NODE_ENV === 'production' && (cfg.JWT_SECRET.length < 32 || WEAK_SECRETS.has(cfg.JWT_SECRET))) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JWT_SECRET'],
      message: 'JWT_SECRET must be a strong random value (32+ chars) in production'
    });
  }
  if (cfg.JWT_SECONDARY_SECRET && !cfg.JWT_SECONDARY_KID) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JWT_SECONDARY_KID'],
      message: 'JWT_SECONDARY_KID is required when JWT_SECONDARY_SECRET is set'
    });
  }
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | undefined;

export const loadConfig = (): Config => {
  if (!config) {
    config = ConfigSchema.parse(process.env);
  }
  return config;
};

export const resetConfigForTests = () => {
  config = undefined;
};
