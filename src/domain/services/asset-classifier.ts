import { AssetDetailsVO } from '../value-objects/asset-details.vo';
import { AssetKind } from '../value-objects/asset-kind.vo';

export type AssetClassification =
  | { kind: AssetKind.FILE; mimeType?: string; filename?: string }
  | { kind: AssetKind.DATASET }
  | { kind: AssetKind.UNKNOWN; assetType?: string };

/**
 * Decides which download strategy an asset needs from its `assetType`.
 * File assets also carry what the blob download needs; either may be absent.
 */
export function classifyAsset(details: AssetDetailsVO): AssetClassification {
  switch (details.assetType) {
    case AssetKind.FILE:
      return {
        kind: AssetKind.FILE,
        mimeType: details.blobMimeType,
        filename: details.blobFilename,
      };
    case AssetKind.DATASET:
      return { kind: AssetKind.DATASET };
    default:
      return { kind: AssetKind.UNKNOWN, assetType: details.assetType };
  }
}
