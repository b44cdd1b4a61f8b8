import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/configuration';
import { HttpClientService, HTTP_CLIENT_OPTIONS, HttpClientOptions } from './http-client.service';

@Module({
  providers: [
    {
      provide: HTTP_CLIENT_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): HttpClientOptions => ({
        timeout: configService.get('catalogApi', { infer: true }).timeout,
      }),
    },
    HttpClientService,
  ],
  exports: [HttpClientService],
})
export class HttpModule {}
