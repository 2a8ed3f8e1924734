/**
 * Environment configuration
 *
 * Parsed once at startup; invalid values abort the boot with the issues listed.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(47777),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().min(1).default('*'),

  ENTROPY_SAMPLE_SIZE: z.coerce.number().int().min(1).max(100_000).default(100),
  ENTROPY_CACHE_SIZE: z.coerce.number().int().min(50).max(1_000_000).default(10_000),
  ENTROPY_REFRESH_INTERVAL_MS: z.coerce.number().int().min(1000).default(300_000),
  ENTROPY_REFRESH_CRON: z.string().min(1).optional(),
  ENTROPY_STALE_AFTER_MS: z.coerce.number().int().min(1000).default(600_000),
  ENTROPY_REFRESH_ON_START: booleanFlag.default('true'),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  return parsed.data;
}
