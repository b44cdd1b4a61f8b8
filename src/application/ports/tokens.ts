// Injection tokens for the driven ports
export const CATALOG_API_PORT = 'CatalogApiPort';
export const ASSET_STORAGE_PORT = 'AssetStoragePort';

// Use case options
export const FILE_DOWNLOAD_OPTIONS = 'FileDownloadOptions';
export const SLEEP = 'Sleep';
