import { AssetDetailsVO } from '../../../domain/value-objects/asset-details.vo';

/**
 * Get Asset Details Port (Driving Port / Use Case Interface)
 * Resolves to null when the details cannot be obtained.
 */
export interface GetAssetDetailsPort {
  execute(assetId: string): Promise<AssetDetailsVO | null>;
}
