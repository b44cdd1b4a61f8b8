import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { FILE_DOWNLOAD_OPTIONS, SLEEP } from './ports/tokens';
import { delay } from '../shared/utils/delay';

// Use Cases
import {
  FetchManifestUseCase,
  GetAssetDetailsUseCase,
  DownloadFileAssetUseCase,
  DownloadTableAssetUseCase,
  ProcessAssetUseCase,
  ProcessAssetsUseCase,
  RunCatalogDownloadUseCase,
  FileDownloadOptions,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) only. The adapters behind
 * them come from the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    {
      provide: FILE_DOWNLOAD_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): FileDownloadOptions => {
        const downloads = configService.get('downloads', { infer: true });
        return {
          retries: downloads.fileRetries,
          baseDelayMs: downloads.retryBaseDelayMs,
        };
      },
    },
    {
      provide: SLEEP,
      useValue: delay,
    },

    // Use Cases
    FetchManifestUseCase,
    GetAssetDetailsUseCase,
    DownloadFileAssetUseCase,
    DownloadTableAssetUseCase,
    ProcessAssetUseCase,
    ProcessAssetsUseCase,
    RunCatalogDownloadUseCase,
  ],
  exports: [
    // The CLI entry point only drives a full run; the rest stay reachable for embedding
    FetchManifestUseCase,
    ProcessAssetsUseCase,
    RunCatalogDownloadUseCase,
  ],
})
export class ApplicationModule {}
