import path from 'node:path';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().default(8086),
  HOST: z.string().default('0.0.0.0'),
  MIRRORS_ADMIN_TOKEN: z.string().min(8),
  MIRRORS_DB_PATH: z.string().default(path.join(process.cwd(), 'data/mirrors.db')),
  MIRRORS_STATUS_CACHE_SECONDS: z.coerce.number().int().positive().default(67),
  MIRRORS_STATUS_CACHE_MAX_BYTES: z.coerce.number().int().positive().default(16 * 1024 * 1024),
  MIRRORS_CORS_ORIGIN: z.string().optional().default(''),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.parse(env);
  return {
    ...parsed,
    appVersion: env.npm_package_version ?? '0.1.0',
    corsOrigins: parsed.MIRRORS_CORS_ORIGIN.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean)
  };
}
