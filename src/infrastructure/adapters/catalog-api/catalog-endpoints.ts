/**
 * URLs of the catalog API. `apiBaseUrl` serves metadata and table exports,
 * `downloadBaseUrl` serves file blobs.
 */
export class CatalogEndpoints {
  constructor(
    private readonly apiBaseUrl: string,
    private readonly downloadBaseUrl: string,
  ) {}

  manifest(): string {
    return `${this.apiBaseUrl}/views/metadata/v1`;
  }

  assetDetails(assetId: string): string {
    return `${this.apiBaseUrl}/views/${encodeURIComponent(assetId)}`;
  }

  tableExport(assetId: string): string {
    return `${this.apiBaseUrl}/views/${encodeURIComponent(assetId)}/rows.csv`;
  }

  /**
   * The mime type is used verbatim as the trailing path segments
   * (`.../{id}/application/pdf`).
   */
  fileBlob(assetId: string, mimeType: string): string {
    return `${this.downloadBaseUrl}/${encodeURIComponent(assetId)}/${mimeType}`;
  }
}
