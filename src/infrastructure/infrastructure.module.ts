import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { HttpModule } from '../shared/http/http.module';
import { ASSET_STORAGE_PORT, CATALOG_API_PORT } from '../application/ports/tokens';
import { CatalogEndpoints } from './adapters/catalog-api/catalog-endpoints';
import { HttpCatalogApiAdapter } from './adapters/catalog-api/http-catalog-api.adapter';
import { LocalAssetStorageAdapter } from './adapters/storage/local-asset-storage.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 */
@Module({
  imports: [HttpModule],
  providers: [
    {
      provide: CatalogEndpoints,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const catalogApi = configService.get('catalogApi', { infer: true });
        return new CatalogEndpoints(catalogApi.apiBaseUrl, catalogApi.downloadBaseUrl);
      },
    },

    // Catalog API adapter
    {
      provide: CATALOG_API_PORT,
      useClass: HttpCatalogApiAdapter,
    },

    // Storage adapter
    {
      provide: ASSET_STORAGE_PORT,
      useClass: LocalAssetStorageAdapter,
    },
  ],
  exports: [CATALOG_API_PORT, ASSET_STORAGE_PORT],
})
export class InfrastructureModule {}
