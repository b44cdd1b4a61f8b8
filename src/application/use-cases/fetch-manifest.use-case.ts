import { Inject, Injectable } from '@nestjs/common';
import {
  FetchManifestCommand,
  FetchManifestPort,
  FetchManifestResult,
} from '../ports/input/fetch-manifest.port';
import type { CatalogApiPort } from '../ports/output/catalog-api.port';
import type { AssetStoragePort } from '../ports/output/asset-storage.port';
import { ASSET_STORAGE_PORT, CATALOG_API_PORT } from '../ports/tokens';
import { ManifestFetchError } from '../../shared/errors/manifest-fetch.error';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { describeFailure } from '../../shared/interfaces/transport-result.interface';
import { formatRunTimestamp } from '../../shared/utils/timestamp';

/**
 * Fetch Manifest Use Case
 * Downloads the catalog manifest once per run. No retry: a run cannot
 * proceed without it.
 */
@Injectable()
export class FetchManifestUseCase implements FetchManifestPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(CATALOG_API_PORT) private readonly catalogApi: CatalogApiPort,
    @Inject(ASSET_STORAGE_PORT) private readonly storage: AssetStoragePort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(FetchManifestUseCase.name);
  }

  async execute(command: FetchManifestCommand = {}): Promise<FetchManifestResult> {
    const response = await this.catalogApi.fetchManifest();

    if (!response.ok) {
      this.logger.error(
        { code: response.error.code, statusCode: response.error.statusCode, cause: response.error.message },
        `Error downloading metadata: ${describeFailure(response.error)}`,
      );
      throw new ManifestFetchError(response.error);
    }

    const fileName = `metadata_${formatRunTimestamp(command.requestedAt ?? new Date())}.json`;
    const manifestPath = await this.storage.writeJson(fileName, response.value);

    this.logger.info({ manifestPath }, `Downloaded metadata to ${manifestPath}`);

    return {
      manifestPath,
      recordCount: Array.isArray(response.value) ? response.value.length : undefined,
    };
  }
}
