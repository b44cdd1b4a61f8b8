import { describe, it, expect } from 'vitest';
import {
  AssetOutcomes,
  AssetOutcomeStatus,
  describeOutcome,
  PayloadStatus,
} from '../../../src/domain/value-objects/asset-outcome.vo';
import { AssetKind } from '../../../src/domain/value-objects/asset-kind.vo';

describe('AssetOutcome', () => {
  it('should build each outcome variant', () => {
    const payload = { status: PayloadStatus.SKIPPED, reason: 'missing blobMimeType' } as const;

    expect(AssetOutcomes.alreadyDone('a1')).toEqual({ status: AssetOutcomeStatus.ALREADY_DONE, assetId: 'a1' });
    expect(AssetOutcomes.noDetails('a1')).toEqual({ status: AssetOutcomeStatus.NO_DETAILS, assetId: 'a1' });
    expect(AssetOutcomes.processed('a1', AssetKind.FILE, payload)).toEqual({
      status: AssetOutcomeStatus.PROCESSED_OK,
      assetId: 'a1',
      kind: AssetKind.FILE,
      payload,
    });
    expect(AssetOutcomes.processingError('a1', 'disk full')).toEqual({
      status: AssetOutcomeStatus.PROCESSING_ERROR,
      assetId: 'a1',
      reason: 'disk full',
    });
  });

  it('should describe each outcome for the log', () => {
    expect(describeOutcome(AssetOutcomes.alreadyDone('a1'))).toBe('Asset a1 metadata already exists. Skipped.');
    expect(describeOutcome(AssetOutcomes.noDetails('a1'))).toBe('No details found for asset a1');
    expect(describeOutcome(AssetOutcomes.processed('a1', AssetKind.DATASET))).toBe(
      'Asset a1 processed successfully.',
    );
    expect(describeOutcome(AssetOutcomes.processingError('a1', 'disk full'))).toBe(
      'Error processing asset a1: disk full',
    );
  });
});
