import * as path from 'path';
import type { Readable } from 'stream';
import { Inject, Injectable } from '@nestjs/common';
import {
  DownloadFileAssetCommand,
  DownloadFileAssetPort,
} from '../ports/input/download-file-asset.port';
import type { CatalogApiPort } from '../ports/output/catalog-api.port';
import type { AssetStoragePort, StoredFile } from '../ports/output/asset-storage.port';
import { ASSET_STORAGE_PORT, CATALOG_API_PORT, FILE_DOWNLOAD_OPTIONS, SLEEP } from '../ports/tokens';
import { AssetDetailsVO } from '../../domain/value-objects/asset-details.vo';
import { PayloadResult, PayloadStatus } from '../../domain/value-objects/asset-outcome.vo';
import { FileExistsError } from '../../shared/errors/file-exists.error';
import { isTransportStreamError } from '../../shared/http/http-client.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import {
  describeFailure,
  TransportErrorCode,
  TransportFailure,
  TransportResult,
} from '../../shared/interfaces/transport-result.interface';
import type { Sleep } from '../../shared/utils/delay';

export interface FileDownloadOptions {
  /** Total attempts, including the first. */
  retries: number;
  /** Sleep after failed attempt k is `baseDelayMs * 2^k`. */
  baseDelayMs: number;
}

/**
 * Download File Asset Use Case
 * Streams the blob of a file asset into the output directory, retrying
 * transport failures with exponential backoff.
 */
@Injectable()
export class DownloadFileAssetUseCase implements DownloadFileAssetPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(CATALOG_API_PORT) private readonly catalogApi: CatalogApiPort,
    @Inject(ASSET_STORAGE_PORT) private readonly storage: AssetStoragePort,
    @Inject(FILE_DOWNLOAD_OPTIONS) private readonly options: FileDownloadOptions,
    @Inject(SLEEP) private readonly sleep: Sleep,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(DownloadFileAssetUseCase.name);
  }

  async execute(command: DownloadFileAssetCommand): Promise<PayloadResult> {
    const { assetId, details } = command;
    const { retries, baseDelayMs } = this.options;

    // Permanent condition: checked once, never retried
    const mimeType = details.blobMimeType;
    if (!mimeType) {
      this.logger.warn({ assetId }, `No blobMimeType found for file asset ${assetId}`);
      return { status: PayloadStatus.SKIPPED, reason: 'missing blobMimeType' };
    }

    let lastFailure: TransportFailure | undefined;

    for (let attempt = 0; attempt < retries; attempt++) {
      const result = await this.attemptDownload(assetId, mimeType, details);

      if (result.ok) {
        this.logger.info(
          { assetId, path: result.value.path, bytesWritten: result.value.bytesWritten, attempt: attempt + 1 },
          `Downloaded file asset ${assetId} to ${result.value.path}`,
        );
        return {
          status: PayloadStatus.DOWNLOADED,
          path: result.value.path,
          bytesWritten: result.value.bytesWritten,
          attempts: attempt + 1,
        };
      }

      lastFailure = result.error;
      this.logger.error(
        {
          assetId,
          attempt: attempt + 1,
          retries,
          code: result.error.code,
          statusCode: result.error.statusCode,
          cause: result.error.message,
        },
        `Error downloading file asset ${assetId} (attempt ${attempt + 1}/${retries}): ${describeFailure(result.error)}`,
      );

      if (attempt < retries - 1) {
        await this.sleep(baseDelayMs * 2 ** attempt);
      }
    }

    this.logger.error({ assetId, retries }, `Failed to download file asset ${assetId} after ${retries} retries.`);

    return { status: PayloadStatus.FAILED, attempts: retries, error: lastFailure };
  }

  private async attemptDownload(
    assetId: string,
    mimeType: string,
    details: AssetDetailsVO,
  ): Promise<TransportResult<StoredFile>> {
    const opened = await this.catalogApi.openFileBlob(assetId, mimeType);
    if (!opened.ok) {
      return opened;
    }

    const { url, body } = opened.value;
    const fileName = this.resolveFileName(assetId, details);

    try {
      const stored = await this.writeWithoutOverwrite(assetId, fileName, body);
      return { ok: true, value: stored };
    } catch (error) {
      if (isTransportStreamError(error)) {
        return {
          ok: false,
          error: { code: TransportErrorCode.NETWORK_ERROR, message: error.message, url },
        };
      }
      // Release the connection held by an unread body
      body.destroy();
      throw error;
    }
  }

  private resolveFileName(assetId: string, details: AssetDetailsVO): string {
    const fileName = details.blobFilename ? path.basename(details.blobFilename) : '';

    if (fileName && fileName !== '.' && fileName !== '..') {
      return fileName;
    }

    const fallback = `${assetId}.file`;
    this.logger.warn(
      { assetId, fallback },
      `blobFilename missing for asset ${assetId}. Using ${fallback} as filename.`,
    );
    return fallback;
  }

  /**
   * An existing file is never overwritten: the name is claimed exclusively,
   * and when it is taken (also by a download still in progress) the blob goes
   * to `{stem}_{assetId}{suffix}` instead.
   */
  private async writeWithoutOverwrite(assetId: string, fileName: string, body: Readable): Promise<StoredFile> {
    try {
      return await this.storage.writeStream(fileName, body, { exclusive: true });
    } catch (error) {
      if (!(error instanceof FileExistsError)) {
        throw error;
      }
    }

    const { name, ext } = path.parse(fileName);
    const renamed = `${name}_${assetId}${ext}`;
    this.logger.warn(
      { assetId, fileName, renamed },
      `File ${fileName} already exists. Renaming to ${this.storage.resolve(renamed)}.`,
    );
    return this.storage.writeStream(renamed, body);
  }
}
