import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { buildConfiguration, ConfigOverrides } from './configuration';

@Global()
@Module({})
export class ConfigModule {
  static forRoot(overrides: ConfigOverrides = {}): DynamicModule {
    return {
      module: ConfigModule,
      imports: [
        NestConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => buildConfiguration(process.env, overrides)],
          cache: true,
        }),
      ],
    };
  }
}
