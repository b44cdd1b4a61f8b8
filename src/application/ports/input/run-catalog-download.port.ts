import { BatchSummary } from './process-assets.port';

/**
 * Run Catalog Download Command
 */
export interface RunCatalogDownloadCommand {
  concurrency: number;
  /** Reuse this manifest file instead of fetching a new one. */
  manifestPath?: string;
  requestedAt?: Date;
}

/**
 * Run Catalog Download Result
 */
export interface RunCatalogDownloadResult {
  runId: string;
  summary: BatchSummary;
}

/**
 * Run Catalog Download Port (Driving Port / Use Case Interface)
 * One full run: manifest, then every asset in it.
 */
export interface RunCatalogDownloadPort {
  execute(command: RunCatalogDownloadCommand): Promise<RunCatalogDownloadResult>;
}
