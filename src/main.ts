#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { AppConfig } from './config/configuration';
import { parseCliOptions, USAGE } from './cli/cli-options';
import { RunCatalogDownloadUseCase } from './application/use-cases';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap a standalone NestJS context and run one catalog download
 */
async function bootstrap(): Promise<void> {
  const options = parseCliOptions(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return;
  }

  // Create NestJS application context (no HTTP server)
  // Invalid configuration must reject here instead of aborting the process
  const app = await NestFactory.createApplicationContext(AppModule.forRoot(options.overrides), {
    bufferLogs: true,
    abortOnError: false,
  });

  const configService = app.get(ConfigService<AppConfig, true>);
  const rootLogger = app.get(PinoLoggerService);

  // Use custom logger
  app.useLogger(rootLogger);
  app.enableShutdownHooks();

  const logger = rootLogger.forContext('Bootstrap');
  const output = configService.get('output', { infer: true });
  const downloads = configService.get('downloads', { infer: true });

  logger.info(
    {
      nodeEnv: configService.get('nodeEnv', { infer: true }),
      pid: process.pid,
      outputDir: output.dir,
      apiBaseUrl: configService.get('catalogApi', { infer: true }).baseUrl,
      concurrency: downloads.concurrency,
    },
    'Catalog asset downloader started',
  );

  try {
    const { summary } = await app.get(RunCatalogDownloadUseCase).execute({
      concurrency: downloads.concurrency,
      manifestPath: options.manifestPath,
    });

    logger.info(
      { counts: summary.counts, poolErrors: summary.poolErrors, aborted: summary.aborted },
      'Run summary',
    );
  } catch (error) {
    logger.error({ err: error }, 'Fatal error in main process');
    process.exitCode = 1;
  } finally {
    await app.close();
    rootLogger.flush();
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start catalog asset downloader:', error);
  process.exitCode = 1;
});
