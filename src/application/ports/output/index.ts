/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { CatalogApiPort, RemoteStream } from './catalog-api.port';
export type { AssetStoragePort, StoredFile, WriteStreamOptions } from './asset-storage.port';
