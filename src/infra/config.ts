import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: positiveInt.default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_EXPIRES_IN_SECONDS: positiveInt.default(7 * 24 * 60 * 60),
  MIN_ADULT_AGE: positiveInt.default(18),
  MIN_VERIFIED_AGE: positiveInt.default(21),
  API_RATE_LIMIT: positiveInt.default(60),
  LOGIN_RATE_LIMIT: positiveInt.default(10),
});

export interface AppConfig {
  port: number;
  /** Only the pool needs it, so a missing URL fails on first query, not on load. */
  databaseUrl?: string;
  jwtSecret?: string;
  jwtExpiresInSeconds: number;
  minAdultAge: number;
  minVerifiedAge: number;
  apiRateLimit: number;
  loginRateLimit: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    jwtSecret: vars.JWT_SECRET,
    jwtExpiresInSeconds: vars.JWT_EXPIRES_IN_SECONDS,
    minAdultAge: vars.MIN_ADULT_AGE,
    minVerifiedAge: vars.MIN_VERIFIED_AGE,
    apiRateLimit: vars.API_RATE_LIMIT,
    loginRateLimit: vars.LOGIN_RATE_LIMIT,
  };
}
