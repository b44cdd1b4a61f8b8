import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';

export const PINO_LOGGER = 'PinoLogger';

export interface RootLoggerOptions {
  level: string;
  pretty: boolean;
  nodeEnv: string;
  logFilePath: string;
}

/**
 * Root logger for a run: console plus the log file inside the output
 * directory. Both targets receive the same records at the configured level.
 */
export function createRootLogger(options: RootLoggerOptions): Logger {
  const { level } = options;

  const consoleTarget: TransportTargetOptions = options.pretty
    ? {
        target: 'pino-pretty',
        level,
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 1,
        },
      }
    : { target: 'pino/file', level, options: { destination: 1 } };

  return pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'catalog-asset-downloader',
      env: options.nodeEnv,
    },
    transport: {
      targets: [
        consoleTarget,
        { target: 'pino/file', level, options: { destination: options.logFilePath, mkdir: true } },
      ],
    },
  });
}
