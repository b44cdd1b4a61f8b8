import { PayloadResult } from '../../../domain/value-objects/asset-outcome.vo';

/**
 * Download Table Asset Port (Driving Port / Use Case Interface)
 * Downloads the CSV export of a dataset asset once, without retry.
 */
export interface DownloadTableAssetPort {
  execute(assetId: string): Promise<PayloadResult>;
}
