import { Inject, Injectable } from '@nestjs/common';
import { GetAssetDetailsPort } from '../ports/input/get-asset-details.port';
import type { CatalogApiPort } from '../ports/output/catalog-api.port';
import { CATALOG_API_PORT } from '../ports/tokens';
import { AssetDetailsVO } from '../../domain/value-objects/asset-details.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { describeFailure } from '../../shared/interfaces/transport-result.interface';

/**
 * Get Asset Details Use Case
 * One request per call; a failure means "skip this asset", never an error.
 */
@Injectable()
export class GetAssetDetailsUseCase implements GetAssetDetailsPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(CATALOG_API_PORT) private readonly catalogApi: CatalogApiPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(GetAssetDetailsUseCase.name);
  }

  async execute(assetId: string): Promise<AssetDetailsVO | null> {
    const response = await this.catalogApi.fetchAssetDetails(assetId);

    if (!response.ok) {
      this.logger.error(
        { assetId, code: response.error.code, statusCode: response.error.statusCode, cause: response.error.message },
        `Error getting details for asset ${assetId}: ${describeFailure(response.error)}`,
      );
      return null;
    }

    const details = AssetDetailsVO.fromJson(response.value);
    if (!details) {
      this.logger.warn({ assetId }, `Details for asset ${assetId} are empty or not a JSON object`);
    }

    return details;
  }
}
