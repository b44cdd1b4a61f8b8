import type { Readable } from 'stream';

export interface StoredFile {
  path: string;
  bytesWritten: number;
}

export interface WriteStreamOptions {
  /**
   * Create the file only if it does not exist yet. A taken name rejects with
   * `FileExistsError` before the source is read.
   */
  exclusive?: boolean;
}

/**
 * Asset Storage Port (Driven Port)
 * The output directory. Names are relative to its root.
 */
export interface AssetStoragePort {
  /**
   * Create the root directory if it does not exist
   */
  ensureRoot(): Promise<void>;

  /**
   * Full path of a name inside the root
   */
  resolve(name: string): string;

  exists(name: string): Promise<boolean>;

  /**
   * Serialize a JSON value to a file, replacing it if present
   */
  writeJson(name: string, value: unknown): Promise<string>;

  /**
   * Write a byte stream to a file in fixed-size chunks. When the source or
   * the write fails, the partial file is removed and the error is rethrown.
   * The source is left untouched when the file cannot be opened.
   */
  writeStream(name: string, source: Readable, options?: WriteStreamOptions): Promise<StoredFile>;

  /**
   * Read a whole text file given by path (absolute, or relative to the
   * working directory)
   */
  readText(filePath: string): Promise<string>;
}
