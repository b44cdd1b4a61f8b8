import { AssetOutcome } from '../../../domain/value-objects/asset-outcome.vo';

/**
 * Process Asset Port (Driving Port / Use Case Interface)
 * Runs one asset from the already-processed check to its payload download.
 * Never rejects.
 */
export interface ProcessAssetPort {
  execute(assetId: string): Promise<AssetOutcome>;
}
