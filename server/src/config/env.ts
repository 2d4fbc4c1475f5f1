import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  CORS_ORIGIN: z.string().default('*'),
  JWT_SECRET: z.string().min(1).default('dev_secret_change_me'),
  DEFAULT_MODE: z.enum(['deterministic', 'randomized']).default('deterministic'),
  SESSION_IDLE_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60),
  SESSION_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
});

export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.parse(source);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    jwtSecret: parsed.JWT_SECRET,
    defaultMode: parsed.DEFAULT_MODE,
    sessionIdleTtlSeconds: parsed.SESSION_IDLE_TTL_SECONDS,
    sessionSweepIntervalSeconds: parsed.SESSION_SWEEP_INTERVAL_SECONDS,
  };
}

export type Env = ReturnType<typeof loadEnv>;

export const env: Env = loadEnv();
