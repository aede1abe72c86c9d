/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 * - TTLs are exposed in seconds; env vars keep the units operators think in.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const LogLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

const JwtAlgorithmSchema = z.enum(['HS256', 'HS384', 'HS512']).default('HS256');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: LogLevelSchema,
  SERVICE_NAME: z.string().default('authcore-backend'),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // Tokens
  JWT_SECRET: z.string().min(32),
  JWT_ALGORITHM: JwtAlgorithmSchema,
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().min(1).max(1440).default(30),
  REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().min(1).max(90).default(7),
  PASSWORD_RESET_TOKEN_TTL_MINUTES: z.coerce.number().int().min(5).max(1440).default(60),
  EMAIL_VERIFICATION_TOKEN_TTL_HOURS: z.coerce.number().int().min(1).max(168).default(24),

  // Login lockout
  LOGIN_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(50).default(5),
  LOGIN_LOCKOUT_MINUTES: z.coerce.number().int().min(1).max(1440).default(15),

  // Two-factor
  TWO_FA_CODE_TTL_MINUTES: z.coerce.number().int().min(1).max(60).default(10),
  TWO_FA_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
  TWO_FA_LOCKOUT_MINUTES: z.coerce.number().int().min(1).max(1440).default(15),
  TOTP_LOGIN_TTL_SECONDS: z.coerce.number().int().min(60).max(1800).default(300),
  TOTP_SETUP_TTL_SECONDS: z.coerce.number().int().min(60).max(3600).default(600),
  TOTP_ISSUER: z.string().min(1).default('Authcore'),
  TOTP_ENCRYPTION_KEY_BASE64: z.string().min(1),

  // Used to build links in outbound messages
  APP_BASE_URL: z.string().url().default('http://localhost:5173'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type JwtAlgorithm = z.infer<typeof JwtAlgorithmSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  databaseUrl: string;
  redisUrl: string;

  logLevel: LogLevel;
  serviceName: string;

  bcryptCost: number;

  tokens: {
    secret: string;
    algorithm: JwtAlgorithm;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
    passwordResetTtlSeconds: number;
    emailVerificationTtlSeconds: number;
  };

  loginGuard: {
    maxAttempts: number;
    lockoutSeconds: number;
  };

  twoFactor: {
    codeTtlSeconds: number;
    maxAttempts: number;
    lockoutSeconds: number;
    totpLoginTtlSeconds: number;
    totpSetupTtlSeconds: number;
    totpIssuer: string;
    encryptionKeyBase64: string;
  };

  appBaseUrl: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    tokens: {
      secret: parsed.JWT_SECRET,
      algorithm: parsed.JWT_ALGORITHM,
      accessTtlSeconds: parsed.ACCESS_TOKEN_TTL_MINUTES * 60,
      refreshTtlSeconds: parsed.REFRESH_TOKEN_TTL_DAYS * 86_400,
      passwordResetTtlSeconds: parsed.PASSWORD_RESET_TOKEN_TTL_MINUTES * 60,
      emailVerificationTtlSeconds: parsed.EMAIL_VERIFICATION_TOKEN_TTL_HOURS * 3600,
    },

    loginGuard: {
      maxAttempts: parsed.LOGIN_MAX_ATTEMPTS,
      lockoutSeconds: parsed.LOGIN_LOCKOUT_MINUTES * 60,
    },

    twoFactor: {
      codeTtlSeconds: parsed.TWO_FA_CODE_TTL_MINUTES * 60,
      maxAttempts: parsed.TWO_FA_MAX_ATTEMPTS,
      lockoutSeconds: parsed.TWO_FA_LOCKOUT_MINUTES * 60,
      totpLoginTtlSeconds: parsed.TOTP_LOGIN_TTL_SECONDS,
      totpSetupTtlSeconds: parsed.TOTP_SETUP_TTL_SECONDS,
      totpIssuer: parsed.TOTP_ISSUER,
      encryptionKeyBase64: parsed.TOTP_ENCRYPTION_KEY_BASE64,
    },

    appBaseUrl: parsed.APP_BASE_URL,
  };
}
