import * as path from 'path';
import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/configuration';
import { createRootLogger, PINO_LOGGER } from './logger.factory';
import { PinoLoggerService } from './pino-logger.service';

@Global()
@Module({
  providers: [
    {
      provide: PINO_LOGGER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const output = configService.get('output', { infer: true });
        return createRootLogger({
          level: configService.get('logLevel', { infer: true }),
          pretty: configService.get('logPretty', { infer: true }),
          nodeEnv: configService.get('nodeEnv', { infer: true }),
          logFilePath: path.join(output.dir, output.logFile),
        });
      },
    },
    PinoLoggerService,
  ],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
