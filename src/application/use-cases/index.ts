/**
 * Use Cases Barrel Export
 */
export { FetchManifestUseCase } from './fetch-manifest.use-case';
export { GetAssetDetailsUseCase } from './get-asset-details.use-case';
export { DownloadFileAssetUseCase, type FileDownloadOptions } from './download-file-asset.use-case';
export { DownloadTableAssetUseCase } from './download-table-asset.use-case';
export { ProcessAssetUseCase } from './process-asset.use-case';
export { ProcessAssetsUseCase } from './process-assets.use-case';
export { RunCatalogDownloadUseCase } from './run-catalog-download.use-case';
