import { Inject, Injectable } from '@nestjs/common';
import { DownloadTableAssetPort } from '../ports/input/download-table-asset.port';
import type { CatalogApiPort } from '../ports/output/catalog-api.port';
import type { AssetStoragePort } from '../ports/output/asset-storage.port';
import { ASSET_STORAGE_PORT, CATALOG_API_PORT } from '../ports/tokens';
import { PayloadResult, PayloadStatus } from '../../domain/value-objects/asset-outcome.vo';
import { isTransportStreamError } from '../../shared/http/http-client.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import {
  describeFailure,
  TransportErrorCode,
} from '../../shared/interfaces/transport-result.interface';

/**
 * Download Table Asset Use Case
 * Streams the CSV export of a dataset to `{assetId}.csv`, replacing any
 * previous export. Single attempt.
 */
@Injectable()
export class DownloadTableAssetUseCase implements DownloadTableAssetPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(CATALOG_API_PORT) private readonly catalogApi: CatalogApiPort,
    @Inject(ASSET_STORAGE_PORT) private readonly storage: AssetStoragePort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(DownloadTableAssetUseCase.name);
  }

  async execute(assetId: string): Promise<PayloadResult> {
    const opened = await this.catalogApi.openTableExport(assetId);

    if (!opened.ok) {
      this.logger.error(
        { assetId, code: opened.error.code, statusCode: opened.error.statusCode, cause: opened.error.message },
        `Error downloading table asset ${assetId}: ${describeFailure(opened.error)}`,
      );
      return { status: PayloadStatus.FAILED, attempts: 1, error: opened.error };
    }

    try {
      const stored = await this.storage.writeStream(`${assetId}.csv`, opened.value.body);
      this.logger.info(
        { assetId, path: stored.path, bytesWritten: stored.bytesWritten },
        `Downloaded table asset ${assetId} to ${stored.path}`,
      );
      return {
        status: PayloadStatus.DOWNLOADED,
        path: stored.path,
        bytesWritten: stored.bytesWritten,
        attempts: 1,
      };
    } catch (error) {
      if (!isTransportStreamError(error)) {
        opened.value.body.destroy();
        throw error;
      }
      const failure = {
        code: TransportErrorCode.NETWORK_ERROR,
        message: error.message,
        url: opened.value.url,
      };
      this.logger.error(
        { assetId, code: failure.code, cause: failure.message },
        `Error downloading table asset ${assetId}: ${describeFailure(failure)}`,
      );
      return { status: PayloadStatus.FAILED, attempts: 1, error: failure };
    }
  }
}
