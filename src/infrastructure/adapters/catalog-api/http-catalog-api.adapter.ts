import { Injectable } from '@nestjs/common';
import { CatalogApiPort, RemoteStream } from '../../../application/ports/output/catalog-api.port';
import { HttpClientService } from '../../../shared/http/http-client.service';
import {
  TransportResult,
  transportSuccess,
} from '../../../shared/interfaces/transport-result.interface';
import { CatalogEndpoints } from './catalog-endpoints';

/**
 * HTTP Catalog API Adapter
 * Implements CatalogApiPort on top of HttpClientService
 */
@Injectable()
export class HttpCatalogApiAdapter implements CatalogApiPort {
  constructor(
    private readonly httpClient: HttpClientService,
    private readonly endpoints: CatalogEndpoints,
  ) {}

  fetchManifest(): Promise<TransportResult<unknown>> {
    return this.httpClient.getJson(this.endpoints.manifest());
  }

  fetchAssetDetails(assetId: string): Promise<TransportResult<unknown>> {
    return this.httpClient.getJson(this.endpoints.assetDetails(assetId));
  }

  openFileBlob(assetId: string, mimeType: string): Promise<TransportResult<RemoteStream>> {
    return this.openStream(this.endpoints.fileBlob(assetId, mimeType));
  }

  openTableExport(assetId: string): Promise<TransportResult<RemoteStream>> {
    return this.openStream(this.endpoints.tableExport(assetId));
  }

  private async openStream(url: string): Promise<TransportResult<RemoteStream>> {
    const response = await this.httpClient.getStream(url);
    if (!response.ok) {
      return response;
    }
    return transportSuccess({ url, body: response.value.body });
  }
}
