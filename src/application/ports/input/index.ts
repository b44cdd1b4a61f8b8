/**
 * Input Ports (Driving Ports) Barrel Export
 */
export type {
  FetchManifestPort,
  FetchManifestCommand,
  FetchManifestResult,
} from './fetch-manifest.port';
export type { GetAssetDetailsPort } from './get-asset-details.port';
export type {
  DownloadFileAssetPort,
  DownloadFileAssetCommand,
} from './download-file-asset.port';
export type { DownloadTableAssetPort } from './download-table-asset.port';
export type { ProcessAssetPort } from './process-asset.port';
export {
  BatchAbortReason,
  type ProcessAssetsPort,
  type ProcessAssetsCommand,
  type BatchSummary,
} from './process-assets.port';
export type {
  RunCatalogDownloadPort,
  RunCatalogDownloadCommand,
  RunCatalogDownloadResult,
} from './run-catalog-download.port';
