/**
 * Manifest Value Object
 * The ordered list of asset ids a run will process, extracted from the raw
 * manifest document. Unusable records are kept aside with a reason.
 */
export enum ManifestSkipReason {
  NOT_A_MAPPING = 'NOT_A_MAPPING',
  MISSING_ID = 'MISSING_ID',
  INVALID_ID = 'INVALID_ID',
  UNSAFE_ID = 'UNSAFE_ID',
}

export interface SkippedManifestRecord {
  index: number;
  reason: ManifestSkipReason;
}

export type ManifestParseResult =
  | { valid: true; manifest: ManifestVO }
  | { valid: false; reason: string };

type RecordInspection = { id: string } | { reason: ManifestSkipReason };

export class ManifestVO {
  private constructor(
    private readonly _assetIds: readonly string[],
    private readonly _skipped: readonly SkippedManifestRecord[],
    private readonly _recordCount: number,
  ) {}

  static fromJson(document: unknown): ManifestParseResult {
    if (!Array.isArray(document)) {
      return { valid: false, reason: 'Metadata file does not contain a list.' };
    }

    const assetIds: string[] = [];
    const skipped: SkippedManifestRecord[] = [];

    document.forEach((record: unknown, index) => {
      const inspection = ManifestVO.inspect(record);
      if ('id' in inspection) {
        assetIds.push(inspection.id);
      } else {
        skipped.push({ index, reason: inspection.reason });
      }
    });

    return { valid: true, manifest: new ManifestVO(assetIds, skipped, document.length) };
  }

  /**
   * Ids become file names inside the output directory, so anything that
   * could name another directory is rejected.
   */
  static isSafeAssetId(id: string): boolean {
    return !/[/\\]/.test(id) && id !== '.' && id !== '..';
  }

  private static inspect(record: unknown): RecordInspection {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      return { reason: ManifestSkipReason.NOT_A_MAPPING };
    }

    if (!('id' in record)) {
      return { reason: ManifestSkipReason.MISSING_ID };
    }

    const id = record.id;
    if (typeof id !== 'string' || id.length === 0) {
      return { reason: ManifestSkipReason.INVALID_ID };
    }

    if (!ManifestVO.isSafeAssetId(id)) {
      return { reason: ManifestSkipReason.UNSAFE_ID };
    }

    return { id };
  }

  get assetIds(): readonly string[] {
    return this._assetIds;
  }

  get skippedRecords(): readonly SkippedManifestRecord[] {
    return this._skipped;
  }

  get recordCount(): number {
    return this._recordCount;
  }
}
