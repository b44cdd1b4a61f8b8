import { createWriteStream, promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../../config/configuration';
import {
  AssetStoragePort,
  StoredFile,
  WriteStreamOptions,
} from '../../../application/ports/output/asset-storage.port';
import { FileExistsError } from '../../../shared/errors/file-exists.error';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { createSizeTrackingStream } from './size-tracking.stream';

const CHUNK_SIZE = 8 * 1024;

/**
 * Local Asset Storage Adapter
 * Implements AssetStoragePort on the local filesystem, rooted at the
 * configured output directory
 */
@Injectable()
export class LocalAssetStorageAdapter implements AssetStoragePort {
  private readonly rootDir: string;
  private readonly logger: PinoLoggerService;

  constructor(configService: ConfigService<AppConfig, true>, logger: PinoLoggerService) {
    this.rootDir = path.resolve(configService.get('output', { infer: true }).dir);
    this.logger = logger.forContext(LocalAssetStorageAdapter.name);
  }

  async ensureRoot(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  resolve(name: string): string {
    return path.join(this.rootDir, name);
  }

  async exists(name: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(name));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async writeJson(name: string, value: unknown): Promise<string> {
    const filePath = this.resolve(name);
    await fs.writeFile(filePath, JSON.stringify(value), 'utf8');
    this.logger.debug({ path: filePath }, 'Wrote JSON file');
    return filePath;
  }

  async writeStream(name: string, source: Readable, options: WriteStreamOptions = {}): Promise<StoredFile> {
    const filePath = this.resolve(name);
    const handle = await this.open(filePath, options.exclusive ?? false);
    let bytesWritten = 0;

    const sizeTrackingStream = createSizeTrackingStream((bytes) => {
      bytesWritten = bytes;
    });

    try {
      await pipeline(
        source,
        sizeTrackingStream,
        createWriteStream(filePath, { fd: handle, highWaterMark: CHUNK_SIZE }),
      );
    } catch (error) {
      await fs.rm(filePath, { force: true });
      this.logger.debug({ path: filePath }, 'Removed partial file');
      throw error;
    }

    return { path: filePath, bytesWritten };
  }

  readText(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf8');
  }

  // 'wx' creates the file atomically and fails if it exists
  private async open(filePath: string, exclusive: boolean): Promise<FileHandle> {
    try {
      return await fs.open(filePath, exclusive ? 'wx' : 'w');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new FileExistsError(filePath);
      }
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
