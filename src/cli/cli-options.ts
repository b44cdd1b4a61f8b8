import { parseArgs } from 'util';
import type { ConfigOverrides } from '../config/configuration';

export const USAGE = `
catalog-asset-downloader - mirror a public data catalog to a local directory

Usage:
  catalog-asset-downloader [options]

Options:
  --output-dir <dir>     Output directory           (env OUTPUT_DIR, default: cdc_data)
  --log-file <name>      Log file inside output dir (env LOG_FILE, default: download_log.txt)
  --concurrency <n>      Assets processed at once   (env CONCURRENCY, default: 3)
  --api-url <url>        Catalog base URL           (env API_URL, default: https://data.cdc.gov)
  --manifest <path>      Reuse a saved manifest instead of fetching one
  -h, --help             Show this help
`.trim();

export interface CliOptions {
  help: boolean;
  manifestPath?: string;
  overrides: ConfigOverrides;
}

/**
 * Parse command-line arguments. Values are kept as strings and validated
 * together with the environment.
 */
export function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      'output-dir': { type: 'string' },
      'log-file': { type: 'string' },
      concurrency: { type: 'string' },
      'api-url': { type: 'string' },
      manifest: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  return {
    help: values.help ?? false,
    manifestPath: values.manifest,
    overrides: {
      OUTPUT_DIR: values['output-dir'],
      LOG_FILE: values['log-file'],
      CONCURRENCY: values.concurrency,
      API_URL: values['api-url'],
    },
  };
}
