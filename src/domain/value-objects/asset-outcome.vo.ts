import { AssetKind } from './asset-kind.vo';
import { TransportFailure } from '../../shared/interfaces/transport-result.interface';

/**
 * Asset Outcome
 * Terminal state of processing one asset id. Always a value; nothing about
 * a single asset is ever thrown past the batch.
 */
export enum AssetOutcomeStatus {
  ALREADY_DONE = 'ALREADY_DONE',
  NO_DETAILS = 'NO_DETAILS',
  PROCESSED_OK = 'PROCESSED_OK',
  PROCESSING_ERROR = 'PROCESSING_ERROR',
}

export enum PayloadStatus {
  DOWNLOADED = 'DOWNLOADED',
  SKIPPED = 'SKIPPED',
  FAILED = 'FAILED',
}

export type PayloadResult =
  | { status: PayloadStatus.DOWNLOADED; path: string; bytesWritten: number; attempts: number }
  | { status: PayloadStatus.SKIPPED; reason: string }
  | { status: PayloadStatus.FAILED; attempts: number; error?: TransportFailure };

export type AssetOutcome =
  | { status: AssetOutcomeStatus.ALREADY_DONE; assetId: string }
  | { status: AssetOutcomeStatus.NO_DETAILS; assetId: string }
  | {
      status: AssetOutcomeStatus.PROCESSED_OK;
      assetId: string;
      kind: AssetKind;
      payload?: PayloadResult;
    }
  | { status: AssetOutcomeStatus.PROCESSING_ERROR; assetId: string; reason: string };

export const AssetOutcomes = {
  alreadyDone(assetId: string): AssetOutcome {
    return { status: AssetOutcomeStatus.ALREADY_DONE, assetId };
  },

  noDetails(assetId: string): AssetOutcome {
    return { status: AssetOutcomeStatus.NO_DETAILS, assetId };
  },

  processed(assetId: string, kind: AssetKind, payload?: PayloadResult): AssetOutcome {
    return { status: AssetOutcomeStatus.PROCESSED_OK, assetId, kind, payload };
  },

  processingError(assetId: string, reason: string): AssetOutcome {
    return { status: AssetOutcomeStatus.PROCESSING_ERROR, assetId, reason };
  },
};

export function describeOutcome(outcome: AssetOutcome): string {
  switch (outcome.status) {
    case AssetOutcomeStatus.ALREADY_DONE:
      return `Asset ${outcome.assetId} metadata already exists. Skipped.`;
    case AssetOutcomeStatus.NO_DETAILS:
      return `No details found for asset ${outcome.assetId}`;
    case AssetOutcomeStatus.PROCESSED_OK:
      return `Asset ${outcome.assetId} processed successfully.`;
    case AssetOutcomeStatus.PROCESSING_ERROR:
      return `Error processing asset ${outcome.assetId}: ${outcome.reason}`;
  }
}
