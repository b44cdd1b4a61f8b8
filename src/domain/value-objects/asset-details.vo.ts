/**
 * Asset Details Value Object
 * Wraps the untyped detail document of one asset. Only the fields the
 * downloader reads are exposed; everything else is kept for persistence.
 */
export type AssetDetailsRecord = Record<string, unknown>;

function isRecord(value: unknown): value is AssetDetailsRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AssetDetailsVO {
  private constructor(private readonly _raw: AssetDetailsRecord) {}

  /**
   * Returns null when the document is not a JSON object, or is an empty one:
   * neither counts as details.
   */
  static fromJson(value: unknown): AssetDetailsVO | null {
    return isRecord(value) && Object.keys(value).length > 0 ? new AssetDetailsVO(value) : null;
  }

  get assetType(): string | undefined {
    return this.optionalString('assetType');
  }

  get blobMimeType(): string | undefined {
    return this.optionalString('blobMimeType');
  }

  get blobFilename(): string | undefined {
    return this.optionalString('blobFilename');
  }

  toJSON(): AssetDetailsRecord {
    return this._raw;
  }

  private optionalString(key: string): string | undefined {
    const value = this._raw[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }
}
