import {
  AssetOutcome,
  AssetOutcomeStatus,
} from '../../../domain/value-objects/asset-outcome.vo';
import { SkippedManifestRecord } from '../../../domain/value-objects/manifest.vo';

/**
 * Process Assets Command
 */
export interface ProcessAssetsCommand {
  manifestPath: string;
  concurrency: number;
}

export enum BatchAbortReason {
  MALFORMED_JSON = 'MALFORMED_JSON',
  NOT_A_LIST = 'NOT_A_LIST',
}

/**
 * Batch Summary
 */
export interface BatchSummary {
  manifestPath: string;
  recordCount: number;
  skippedRecords: readonly SkippedManifestRecord[];
  /** In completion order. */
  outcomes: AssetOutcome[];
  counts: Record<AssetOutcomeStatus, number>;
  /** Tasks that rejected instead of resolving to an outcome. */
  poolErrors: number;
  aborted?: BatchAbortReason;
}

/**
 * Process Assets Port (Driving Port / Use Case Interface)
 * Processes every asset listed in a manifest file with bounded concurrency.
 */
export interface ProcessAssetsPort {
  execute(command: ProcessAssetsCommand): Promise<BatchSummary>;
}
