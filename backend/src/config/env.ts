/**
 * Environment configuration
 *
 * Read once at import; `.env` is honoured through dotenv.
 * An invalid value aborts start-up.
 */

import 'dotenv/config';
import { z } from 'zod';

export const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGINS: z.string().default('*'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();

export function corsOrigins(value: string): true | string[] {
  if (value.trim() === '*') return true;
  return value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
}
