import { describe, it, expect } from 'vitest';
import { classifyAsset } from '../../../src/domain/services/asset-classifier';
import { AssetDetailsVO } from '../../../src/domain/value-objects/asset-details.vo';
import { AssetKind } from '../../../src/domain/value-objects/asset-kind.vo';

function details(raw: Record<string, unknown>): AssetDetailsVO {
  const vo = AssetDetailsVO.fromJson(raw);
  if (!vo) {
    throw new Error('test details must be an object');
  }
  return vo;
}

describe('classifyAsset', () => {
  it('should classify file assets with their blob fields', () => {
    expect(
      classifyAsset(details({ assetType: 'file', blobMimeType: 'text/plain', blobFilename: 'notes.txt' })),
    ).toEqual({ kind: AssetKind.FILE, mimeType: 'text/plain', filename: 'notes.txt' });
  });

  it('should classify file assets even when blob fields are missing', () => {
    expect(classifyAsset(details({ assetType: 'file' }))).toEqual({
      kind: AssetKind.FILE,
      mimeType: undefined,
      filename: undefined,
    });
  });

  it('should classify datasets', () => {
    expect(classifyAsset(details({ assetType: 'dataset' }))).toEqual({ kind: AssetKind.DATASET });
  });

  it('should report other asset types as unknown', () => {
    expect(classifyAsset(details({ assetType: 'chart' }))).toEqual({
      kind: AssetKind.UNKNOWN,
      assetType: 'chart',
    });
    expect(classifyAsset(details({ name: 'Untitled' }))).toEqual({ kind: AssetKind.UNKNOWN, assetType: undefined });
  });

  it('should match asset types case-sensitively', () => {
    expect(classifyAsset(details({ assetType: 'Dataset' })).kind).toBe(AssetKind.UNKNOWN);
  });
});
