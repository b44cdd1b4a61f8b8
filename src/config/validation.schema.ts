import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  LOG_PRETTY: booleanFlag,

  // Output
  OUTPUT_DIR: z.string().min(1).default('cdc_data'),
  LOG_FILE: z.string().min(1).default('download_log.txt'),

  // Catalog API
  API_URL: z.string().url().default('https://data.cdc.gov'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),

  // Downloads
  CONCURRENCY: z.coerce.number().int().min(1).max(64).default(3),
  FILE_DOWNLOAD_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
