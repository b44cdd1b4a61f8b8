import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import type { ConfigOverrides } from './config/configuration';
import { LoggingModule } from './shared/logging/logging.module';
import { ApplicationModule } from './application/application.module';

/**
 * Application Module
 * Standalone context for one catalog download run (no HTTP server)
 */
@Module({})
export class AppModule {
  static forRoot(overrides: ConfigOverrides = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(overrides), LoggingModule, ApplicationModule],
    };
  }
}
