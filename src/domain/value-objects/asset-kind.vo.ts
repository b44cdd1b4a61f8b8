export enum AssetKind {
  FILE = 'file',
  DATASET = 'dataset',
  UNKNOWN = 'unknown',
}
