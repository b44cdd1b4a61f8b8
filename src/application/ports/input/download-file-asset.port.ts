import { AssetDetailsVO } from '../../../domain/value-objects/asset-details.vo';
import { PayloadResult } from '../../../domain/value-objects/asset-outcome.vo';

/**
 * Download File Asset Command
 */
export interface DownloadFileAssetCommand {
  assetId: string;
  details: AssetDetailsVO;
}

/**
 * Download File Asset Port (Driving Port / Use Case Interface)
 * Downloads the blob of a file asset with retry and backoff. Transport
 * failures are absorbed into the result.
 */
export interface DownloadFileAssetPort {
  execute(command: DownloadFileAssetCommand): Promise<PayloadResult>;
}
