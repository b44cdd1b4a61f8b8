/**
 * Raised by an exclusive write when the target is already taken. Nothing has
 * been read from the source stream at that point.
 */
export class FileExistsError extends Error {
  readonly path: string;

  constructor(filePath: string) {
    super(`File ${filePath} already exists`);
    this.name = 'FileExistsError';
    this.path = filePath;
  }
}
