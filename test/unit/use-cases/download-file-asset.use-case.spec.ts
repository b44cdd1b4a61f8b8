import { describe, it, expect } from 'vitest';
import { errors } from 'undici';
import { createUseCaseGraph } from '../helpers/use-case-graph';
import { createReadableStream, LOG_LEVELS } from '../helpers/mock-factories';
import { brokenStream, httpError, streamOf } from '../../in-memory-adapters';
import { AssetDetailsVO } from '../../../src/domain/value-objects/asset-details.vo';
import { PayloadStatus } from '../../../src/domain/value-objects/asset-outcome.vo';
import { TransportErrorCode, transportSuccess } from '../../../src/shared/interfaces/transport-result.interface';

const ASSET_ID = 'abcd-1234';

function fileDetails(raw: Record<string, unknown> = {}): AssetDetailsVO {
  const details = AssetDetailsVO.fromJson({
    assetType: 'file',
    blobMimeType: 'application/pdf',
    blobFilename: 'report.pdf',
    ...raw,
  });
  if (!details) {
    throw new Error('test details must be an object');
  }
  return details;
}

describe('DownloadFileAssetUseCase', () => {
  describe('Successful Downloads', () => {
    it('should stream the blob to its file name on the first attempt', async () => {
      const graph = createUseCaseGraph();
      graph.catalogApi.setFileBlob(ASSET_ID, streamOf('%PDF-test'));

      const result = await graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() });

      expect(result).toEqual({
        status: PayloadStatus.DOWNLOADED,
        path: '/out/report.pdf',
        bytesWritten: 9,
        attempts: 1,
      });
      expect(graph.storage.read('report.pdf')).toBe('%PDF-test');
      expect(graph.catalogApi.calls.fileBlob).toEqual([{ assetId: ASSET_ID, mimeType: 'application/pdf' }]);
      expect(graph.delays).toEqual([]);
    });

    it('should fall back to {id}.file when blobFilename is missing', async () => {
      const graph = createUseCaseGraph();
      graph.catalogApi.setFileBlob(ASSET_ID, streamOf('plain'));

      const result = await graph.downloadFileAsset.execute({
        assetId: ASSET_ID,
        details: fileDetails({ blobFilename: undefined }),
      });

      expect(result.status === PayloadStatus.DOWNLOADED && result.path).toBe('/out/abcd-1234.file');
      expect(graph.log.messages(LOG_LEVELS.warn)).toEqual([
        'blobFilename missing for asset abcd-1234. Using abcd-1234.file as filename.',
      ]);
    });

    it('should keep only the base name of blobFilename', async () => {
      const graph = createUseCaseGraph();
      graph.catalogApi.setFileBlob(ASSET_ID, streamOf('a,b'));

      const result = await graph.downloadFileAsset.execute({
        assetId: ASSET_ID,
        details: fileDetails({ blobFilename: 'reports/2024/summary.csv' }),
      });

      expect(result.status === PayloadStatus.DOWNLOADED && result.path).toBe('/out/summary.csv');
    });

    it('should rename instead of overwriting an existing file', async () => {
      const graph = createUseCaseGraph();
      graph.storage.seed('report.pdf', 'from another asset');
      graph.catalogApi.setFileBlob(ASSET_ID, streamOf('%PDF-test'));

      const result = await graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() });

      expect(result.status === PayloadStatus.DOWNLOADED && result.path).toBe('/out/report_abcd-1234.pdf');
      expect(graph.storage.read('report.pdf')).toBe('from another asset');
      expect(graph.storage.read('report_abcd-1234.pdf')).toBe('%PDF-test');
      expect(graph.log.messages(LOG_LEVELS.warn)).toEqual([
        'File report.pdf already exists. Renaming to /out/report_abcd-1234.pdf.',
      ]);
    });
  });

  describe('Missing Mime Type', () => {
    it('should skip without any request', async () => {
      const graph = createUseCaseGraph();

      const result = await graph.downloadFileAsset.execute({
        assetId: ASSET_ID,
        details: fileDetails({ blobMimeType: '' }),
      });

      expect(result).toEqual({ status: PayloadStatus.SKIPPED, reason: 'missing blobMimeType' });
      expect(graph.catalogApi.calls.fileBlob).toEqual([]);
      expect(graph.log.messages(LOG_LEVELS.warn)).toEqual(['No blobMimeType found for file asset abcd-1234']);
    });
  });

  describe('Retry and Backoff', () => {
    it('should make exactly `retries` attempts and sleep only between them', async () => {
      const graph = createUseCaseGraph();
      graph.catalogApi.setFileBlob(ASSET_ID, () => httpError(500));

      const result = await graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() });

      expect(result).toEqual({
        status: PayloadStatus.FAILED,
        attempts: 3,
        error: {
          code: TransportErrorCode.HTTP_STATUS,
          message: 'HTTP 500',
          statusCode: 500,
          url: 'https://catalog.test',
        },
      });
      expect(graph.catalogApi.calls.fileBlob).toHaveLength(3);
      expect(graph.delays).toEqual([1000, 2000]);
      expect(graph.log.messages(LOG_LEVELS.error)).toEqual([
        'Error downloading file asset abcd-1234 (attempt 1/3): HTTP 500 from https://catalog.test',
        'Error downloading file asset abcd-1234 (attempt 2/3): HTTP 500 from https://catalog.test',
        'Error downloading file asset abcd-1234 (attempt 3/3): HTTP 500 from https://catalog.test',
        'Failed to download file asset abcd-1234 after 3 retries.',
      ]);
      expect(graph.storage.files.size).toBe(0);
    });

    it('should double the delay after each failed attempt', async () => {
      const graph = createUseCaseGraph({ retries: 5, baseDelayMs: 100 });
      graph.catalogApi.setFileBlob(ASSET_ID, () => httpError(503));

      await graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() });

      expect(graph.catalogApi.calls.fileBlob).toHaveLength(5);
      expect(graph.delays).toEqual([100, 200, 400, 800]);
    });

    it('should not sleep when a single attempt is allowed', async () => {
      const graph = createUseCaseGraph({ retries: 1 });
      graph.catalogApi.setFileBlob(ASSET_ID, () => httpError(500));

      const result = await graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() });

      expect(result.status).toBe(PayloadStatus.FAILED);
      expect(graph.delays).toEqual([]);
    });

    it('should retry a transfer that breaks mid-stream and discard the partial file', async () => {
      const graph = createUseCaseGraph();
      graph.catalogApi.setFileBlob(
        ASSET_ID,
        brokenStream(new errors.SocketError('other side closed')),
        streamOf('%PDF-test'),
      );

      const result = await graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() });

      expect(result).toEqual({
        status: PayloadStatus.DOWNLOADED,
        path: '/out/report.pdf',
        bytesWritten: 9,
        attempts: 2,
      });
      expect(graph.delays).toEqual([1000]);
      expect(graph.storage.fileNames()).toEqual(['report.pdf']);
      expect(graph.log.messages(LOG_LEVELS.error)).toEqual([
        'Error downloading file asset abcd-1234 (attempt 1/3): other side closed (https://catalog.test/blob)',
      ]);
    });

    it('should succeed on the third attempt after two failures', async () => {
      const graph = createUseCaseGraph();
      graph.catalogApi.setFileBlob(ASSET_ID, () => httpError(502), () => httpError(502), streamOf('%PDF-test'));

      const result = await graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() });

      expect(result.status === PayloadStatus.DOWNLOADED && result.attempts).toBe(3);
      expect(graph.delays).toEqual([1000, 2000]);
    });
  });

  describe('Filesystem Errors', () => {
    it('should propagate errors that do not come from the transport', async () => {
      const graph = createUseCaseGraph();
      graph.storage.failWritesWith(new Error('ENOSPC: no space left on device'));
      graph.catalogApi.setFileBlob(ASSET_ID, streamOf('%PDF-test'));

      await expect(
        graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() }),
      ).rejects.toThrow('ENOSPC: no space left on device');
      expect(graph.catalogApi.calls.fileBlob).toHaveLength(1);
      expect(graph.delays).toEqual([]);
    });

    it('should release the unread body when the write fails', async () => {
      const graph = createUseCaseGraph();
      const body = createReadableStream('%PDF-test');
      graph.storage.failWritesWith(new Error('EACCES: permission denied'));
      graph.catalogApi.setFileBlob(ASSET_ID, () => transportSuccess({ url: 'https://catalog.test/blob', body }));

      await expect(
        graph.downloadFileAsset.execute({ assetId: ASSET_ID, details: fileDetails() }),
      ).rejects.toThrow('EACCES: permission denied');
      expect(body.destroyed).toBe(true);
    });
  });
});
