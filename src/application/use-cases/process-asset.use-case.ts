import { Inject, Injectable } from '@nestjs/common';
import { ProcessAssetPort } from '../ports/input/process-asset.port';
import type { AssetStoragePort } from '../ports/output/asset-storage.port';
import { ASSET_STORAGE_PORT } from '../ports/tokens';
import { GetAssetDetailsUseCase } from './get-asset-details.use-case';
import { DownloadFileAssetUseCase } from './download-file-asset.use-case';
import { DownloadTableAssetUseCase } from './download-table-asset.use-case';
import { classifyAsset } from '../../domain/services/asset-classifier';
import { AssetKind } from '../../domain/value-objects/asset-kind.vo';
import {
  AssetOutcome,
  AssetOutcomes,
  PayloadResult,
} from '../../domain/value-objects/asset-outcome.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export const detailsFileName = (assetId: string): string => `${assetId}_metadata.json`;

/**
 * Process Asset Use Case
 *
 * The details file doubles as the "already processed" marker. It is written
 * before the payload download starts, so an interrupted download leaves the
 * asset marked done without its payload. The existence check is not atomic:
 * two runs sharing an output directory can both process the same asset.
 */
@Injectable()
export class ProcessAssetUseCase implements ProcessAssetPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ASSET_STORAGE_PORT) private readonly storage: AssetStoragePort,
    private readonly getAssetDetails: GetAssetDetailsUseCase,
    private readonly downloadFileAsset: DownloadFileAssetUseCase,
    private readonly downloadTableAsset: DownloadTableAssetUseCase,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(ProcessAssetUseCase.name);
  }

  async execute(assetId: string): Promise<AssetOutcome> {
    const logger = this.logger.withAssetId(assetId);
    const detailsName = detailsFileName(assetId);

    try {
      if (await this.storage.exists(detailsName)) {
        logger.info(`Metadata file already exists for asset ${assetId}. Skipping.`);
        return AssetOutcomes.alreadyDone(assetId);
      }

      const details = await this.getAssetDetails.execute(assetId);
      if (!details) {
        return AssetOutcomes.noDetails(assetId);
      }

      await this.storage.writeJson(detailsName, details.toJSON());

      const classification = classifyAsset(details);
      let payload: PayloadResult | undefined;

      switch (classification.kind) {
        case AssetKind.FILE:
          payload = await this.downloadFileAsset.execute({ assetId, details });
          break;
        case AssetKind.DATASET:
          payload = await this.downloadTableAsset.execute(assetId);
          break;
        case AssetKind.UNKNOWN:
          logger.warn(
            { assetType: classification.assetType },
            `Unknown asset type ${classification.assetType ?? ''} for ${assetId}`,
          );
          break;
      }

      return AssetOutcomes.processed(assetId, classification.kind, payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ err: error }, `Error processing asset ${assetId}: ${reason}`);
      return AssetOutcomes.processingError(assetId, reason);
    }
  }
}
