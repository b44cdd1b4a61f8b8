import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  RunCatalogDownloadCommand,
  RunCatalogDownloadPort,
  RunCatalogDownloadResult,
} from '../ports/input/run-catalog-download.port';
import type { AssetStoragePort } from '../ports/output/asset-storage.port';
import { ASSET_STORAGE_PORT } from '../ports/tokens';
import { FetchManifestUseCase } from './fetch-manifest.use-case';
import { ProcessAssetsUseCase } from './process-assets.use-case';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Run Catalog Download Use Case
 * One run: obtain the manifest, then process every asset in it. Only a
 * failed manifest fetch makes the run reject.
 */
@Injectable()
export class RunCatalogDownloadUseCase implements RunCatalogDownloadPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ASSET_STORAGE_PORT) private readonly storage: AssetStoragePort,
    private readonly fetchManifest: FetchManifestUseCase,
    private readonly processAssets: ProcessAssetsUseCase,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(RunCatalogDownloadUseCase.name);
  }

  async execute(command: RunCatalogDownloadCommand): Promise<RunCatalogDownloadResult> {
    const runId = uuidv4();
    const logger = this.logger.withRunId(runId);
    const startTime = Date.now();

    await this.storage.ensureRoot();

    let manifestPath = command.manifestPath;
    if (manifestPath) {
      logger.info({ manifestPath }, `Using existing manifest ${manifestPath}`);
    } else {
      const fetched = await this.fetchManifest.execute({ requestedAt: command.requestedAt });
      manifestPath = fetched.manifestPath;
    }

    const summary = await this.processAssets.execute({
      manifestPath,
      concurrency: command.concurrency,
    });

    logger.info(
      { durationMs: Date.now() - startTime, aborted: summary.aborted },
      'Catalog download finished',
    );

    return { runId, summary };
  }
}
