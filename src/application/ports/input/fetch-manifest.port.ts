/**
 * Fetch Manifest Command
 */
export interface FetchManifestCommand {
  /** Time used for the manifest file name; defaults to now. */
  requestedAt?: Date;
}

/**
 * Fetch Manifest Result
 */
export interface FetchManifestResult {
  manifestPath: string;
  /** Number of records, when the document is a list. */
  recordCount?: number;
}

/**
 * Fetch Manifest Port (Driving Port / Use Case Interface)
 * Downloads the catalog manifest and stores it under a timestamped name.
 * Failure is fatal for the run and is thrown as a ManifestFetchError.
 */
export interface FetchManifestPort {
  execute(command?: FetchManifestCommand): Promise<FetchManifestResult>;
}
