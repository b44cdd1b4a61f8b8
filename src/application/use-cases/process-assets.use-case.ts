import { Inject, Injectable } from '@nestjs/common';
import {
  BatchAbortReason,
  BatchSummary,
  ProcessAssetsCommand,
  ProcessAssetsPort,
} from '../ports/input/process-assets.port';
import type { AssetStoragePort } from '../ports/output/asset-storage.port';
import { ASSET_STORAGE_PORT } from '../ports/tokens';
import { ProcessAssetUseCase } from './process-asset.use-case';
import {
  AssetOutcome,
  AssetOutcomeStatus,
  describeOutcome,
} from '../../domain/value-objects/asset-outcome.vo';
import { ManifestSkipReason, ManifestVO } from '../../domain/value-objects/manifest.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { TaskPool } from '../../worker-pool/task-pool';

const emptyCounts = (): Record<AssetOutcomeStatus, number> => ({
  [AssetOutcomeStatus.ALREADY_DONE]: 0,
  [AssetOutcomeStatus.NO_DETAILS]: 0,
  [AssetOutcomeStatus.PROCESSED_OK]: 0,
  [AssetOutcomeStatus.PROCESSING_ERROR]: 0,
});

/**
 * Process Assets Use Case
 * Reads a manifest file and runs every listed asset through
 * ProcessAssetUseCase on a bounded pool. No single asset can stop the batch.
 */
@Injectable()
export class ProcessAssetsUseCase implements ProcessAssetsPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ASSET_STORAGE_PORT) private readonly storage: AssetStoragePort,
    private readonly processAsset: ProcessAssetUseCase,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(ProcessAssetsUseCase.name);
  }

  async execute(command: ProcessAssetsCommand): Promise<BatchSummary> {
    const { manifestPath, concurrency } = command;
    const summary: BatchSummary = {
      manifestPath,
      recordCount: 0,
      skippedRecords: [],
      outcomes: [],
      counts: emptyCounts(),
      poolErrors: 0,
    };

    const text = await this.storage.readText(manifestPath);

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      const cause = error instanceof Error ? error.message : String(error);
      this.logger.error({ manifestPath, cause }, `Error decoding metadata JSON: ${cause}`);
      return { ...summary, aborted: BatchAbortReason.MALFORMED_JSON };
    }

    const parsed = ManifestVO.fromJson(document);
    if (!parsed.valid) {
      this.logger.error({ manifestPath }, parsed.reason);
      return { ...summary, aborted: BatchAbortReason.NOT_A_LIST };
    }

    const { manifest } = parsed;
    for (const skipped of manifest.skippedRecords) {
      this.logger.warn(
        { index: skipped.index, reason: skipped.reason },
        `Skipping manifest record ${skipped.index}: ${this.describeSkip(skipped.reason)}`,
      );
    }

    summary.recordCount = manifest.recordCount;
    summary.skippedRecords = manifest.skippedRecords;
    this.logger.info(
      { assetCount: manifest.assetIds.length, concurrency },
      `Found ${manifest.assetIds.length} assets to process.`,
    );

    const pool = new TaskPool<string, AssetOutcome>(concurrency);
    const stats = await pool.run(
      manifest.assetIds,
      (assetId) => this.processAsset.execute(assetId),
      (settled) => {
        if (settled.status === 'fulfilled') {
          this.record(summary, settled.value);
          return;
        }
        summary.poolErrors++;
        const cause = settled.reason instanceof Error ? settled.reason.message : String(settled.reason);
        this.logger.error(
          { assetId: settled.item, cause },
          `A worker raised an exception for asset ${settled.item}: ${cause}`,
        );
      },
    );

    this.logger.info(
      { ...summary.counts, poolErrors: summary.poolErrors, peakActiveTasks: stats.peakActiveTasks },
      `Processed ${stats.completedTasks} of ${stats.submittedTasks} assets`,
    );

    return summary;
  }

  private record(summary: BatchSummary, outcome: AssetOutcome): void {
    summary.outcomes.push(outcome);
    summary.counts[outcome.status]++;

    const bindings = { assetId: outcome.assetId, status: outcome.status };
    if (outcome.status === AssetOutcomeStatus.PROCESSING_ERROR) {
      this.logger.error(bindings, describeOutcome(outcome));
    } else {
      this.logger.info(bindings, describeOutcome(outcome));
    }
  }

  private describeSkip(reason: ManifestSkipReason): string {
    switch (reason) {
      case ManifestSkipReason.NOT_A_MAPPING:
        return 'item in the list is not an object';
      case ManifestSkipReason.MISSING_ID:
        return "item in the list does not contain an 'id' key";
      case ManifestSkipReason.INVALID_ID:
        return "'id' is not a non-empty string";
      case ManifestSkipReason.UNSAFE_ID:
        return "'id' cannot be used as a file name";
    }
  }
}
