/**
 * Application Configuration
 *
 * Loads the environment, applies command-line overrides on top of it and
 * validates the result with the zod schema in `validation.schema.ts`.
 *
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig, true>) {}
 *
 * const { concurrency } = this.configService.get('downloads', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

/**
 * Values given on the command line. Keys are the environment variable
 * names they replace, so both sources go through the same schema.
 */
export type ConfigOverrides = Partial<Record<keyof EnvConfig, string>>;

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  logPretty: boolean;
  output: {
    /** Root of every file the run writes. */
    dir: string;
    /** Log file name, relative to `output.dir`. */
    logFile: string;
  };
  catalogApi: {
    baseUrl: string;
    apiBaseUrl: string;
    downloadBaseUrl: string;
    timeout: number;
  };
  /**
   * ### concurrency (CONCURRENCY, --concurrency)
   * Number of assets processed at the same time. Each worker handles one
   * asset from detail fetch to payload download before taking the next.
   *
   * ### fileRetries (FILE_DOWNLOAD_RETRIES)
   * Total attempts for a file blob download. Table exports are never retried.
   *
   * ### retryBaseDelayMs (RETRY_BASE_DELAY_MS)
   * Sleep after failed attempt k is `retryBaseDelayMs * 2^k`.
   */
  downloads: {
    concurrency: number;
    fileRetries: number;
    retryBaseDelayMs: number;
  };
}

function withoutTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function buildConfiguration(
  env: Record<string, unknown>,
  overrides: ConfigOverrides = {},
): AppConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const validated: EnvConfig = validateEnv({ ...env, ...defined });
  const baseUrl = withoutTrailingSlash(validated.API_URL);

  return {
    nodeEnv: validated.NODE_ENV,
    logLevel: validated.LOG_LEVEL,
    logPretty: validated.LOG_PRETTY,
    output: {
      dir: validated.OUTPUT_DIR,
      logFile: validated.LOG_FILE,
    },
    catalogApi: {
      baseUrl,
      apiBaseUrl: `${baseUrl}/api`,
      downloadBaseUrl: `${baseUrl}/download`,
      timeout: validated.HTTP_TIMEOUT_MS,
    },
    downloads: {
      concurrency: validated.CONCURRENCY,
      fileRetries: validated.FILE_DOWNLOAD_RETRIES,
      retryBaseDelayMs: validated.RETRY_BASE_DELAY_MS,
    },
  };
}

export default (): AppConfig => buildConfiguration(process.env);
