import type { Readable } from 'stream';
import { TransportResult } from '../../../shared/interfaces/transport-result.interface';

/**
 * An opened payload: the URL it came from and its unread body
 */
export interface RemoteStream {
  url: string;
  body: Readable;
}

/**
 * Catalog API Port (Driven Port)
 * The remote metadata service: manifest, per-asset details and payloads.
 */
export interface CatalogApiPort {
  /**
   * Raw manifest document (expected to be a JSON array of asset summaries)
   */
  fetchManifest(): Promise<TransportResult<unknown>>;

  /**
   * Raw detail document of one asset
   */
  fetchAssetDetails(assetId: string): Promise<TransportResult<unknown>>;

  /**
   * Open the blob of a file asset as a byte stream
   */
  openFileBlob(assetId: string, mimeType: string): Promise<TransportResult<RemoteStream>>;

  /**
   * Open the CSV export of a dataset asset as a byte stream
   */
  openTableExport(assetId: string): Promise<TransportResult<RemoteStream>>;
}
