import { Inject, Injectable, LoggerService } from '@nestjs/common';
import type { Logger } from 'pino';
import { PINO_LOGGER } from './logger.factory';

type Bindings = Record<string, unknown>;
type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured logger handed to every component through DI.
 *
 * Components never share mutable context: `forContext`, `withAssetId` and
 * `child` return new instances bound to a pino child logger.
 */
@Injectable()
export class PinoLoggerService implements LoggerService {
  constructor(@Inject(PINO_LOGGER) private readonly logger: Logger) {}

  forContext(context: string): PinoLoggerService {
    return this.child({ context });
  }

  child(bindings: Bindings): PinoLoggerService {
    return new PinoLoggerService(this.logger.child(bindings));
  }

  withRunId(runId: string): PinoLoggerService {
    return this.child({ runId });
  }

  withAssetId(assetId: string): PinoLoggerService {
    return this.child({ assetId });
  }

  info(message: string): void;
  info(bindings: Bindings, message: string): void;
  info(bindingsOrMessage: Bindings | string, message?: string): void {
    this.write('info', bindingsOrMessage, message);
  }

  warn(message: string): void;
  warn(bindings: Bindings, message: string): void;
  warn(bindingsOrMessage: Bindings | string, message?: string): void {
    this.write('warn', bindingsOrMessage, message);
  }

  error(message: string): void;
  error(bindings: Bindings, message: string): void;
  error(bindingsOrMessage: Bindings | string, message?: string): void {
    this.write('error', bindingsOrMessage, message);
  }

  debug(message: string): void;
  debug(bindings: Bindings, message: string): void;
  debug(bindingsOrMessage: Bindings | string, message?: string): void {
    this.write('debug', bindingsOrMessage, message);
  }

  // LoggerService: messages emitted by Nest itself
  log(message: unknown, context?: string): void {
    this.logger.info({ context }, String(message));
  }

  verbose(message: unknown, context?: string): void {
    this.logger.trace({ context }, String(message));
  }

  flush(): void {
    this.logger.flush();
  }

  private write(level: Level, bindingsOrMessage: Bindings | string, message?: string): void {
    if (typeof bindingsOrMessage === 'string') {
      this.logger[level](bindingsOrMessage);
    } else {
      this.logger[level](bindingsOrMessage, message ?? '');
    }
  }
}
