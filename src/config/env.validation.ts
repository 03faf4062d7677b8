import 'dotenv/config';
import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

const flag = z.preprocess((v) => v === 'true' || v === '1' || v === true, z.boolean());

export const envSchema = z
  .object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  API_PREFIX: z.string().default('/api'),

  DATABASE_URL: z.string().min(1),
  // Creates/updates tables from the entity metadata on startup. Keep off in production.
  DB_SYNCHRONIZE: flag.default(false),
  DB_LOGGING: flag.default(false),

  JWT_ACCESS_SECRET: z.string().min(32),
  JWT_REFRESH_SECRET: z.string().min(32),
  JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 60),
  JWT_REFRESH_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24 * 7),

  CORS_ORIGIN: z.string().default('*'),
  THROTTLE_TTL_SECONDS: z.coerce.number().int().positive().default(60),
  THROTTLE_LIMIT: z.coerce.number().int().positive().default(100),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']).default('log'),
  })
  .superRefine((v, ctx) => {
    if (v.NODE_ENV === 'production' && v.DB_SYNCHRONIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DB_SYNCHRONIZE'],
        message: 'DB_SYNCHRONIZE must be disabled in production',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/** Parses the process environment once at startup; the result is passed down explicitly. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

/** The configured level and every level more severe than it. */
export function logLevelsFor(level: Env['LOG_LEVEL']): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
