import { Inject, Injectable, OnModuleDestroy, Optional } from '@nestjs/common';
import { Agent, errors } from 'undici';
import type { Dispatcher } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';
import {
  StreamResponse,
  TransportErrorCode,
  TransportResult,
  transportFailure,
  transportSuccess,
} from '../interfaces/transport-result.interface';

export const HTTP_CLIENT_OPTIONS = 'HttpClientOptions';

export interface HttpClientOptions {
  /** Headers and body timeout, in milliseconds. */
  timeout: number;
  maxRedirections?: number;
  userAgent?: string;
  /** Replaces the owned connection agent, e.g. with an undici MockAgent. */
  dispatcher?: Dispatcher;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

/**
 * Whether an error raised while consuming a streamed body came from the
 * connection rather than from the consumer (e.g. the filesystem).
 */
export function isTransportStreamError(error: unknown): error is Error {
  return error instanceof errors.UndiciError;
}

/**
 * GET-only transport for JSON documents and streamed bodies.
 *
 * Every failure comes back as a `TransportResult` carrying its kind; nothing
 * is retried here.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly defaultTimeout: number;
  private readonly userAgent: string;

  constructor(
    logger: PinoLoggerService,
    @Optional() @Inject(HTTP_CLIENT_OPTIONS) options?: HttpClientOptions,
  ) {
    this.logger = logger.forContext(HttpClientService.name);
    this.defaultTimeout = options?.timeout ?? 30000;
    this.userAgent = options?.userAgent ?? 'catalog-asset-downloader';

    if (options?.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connections: 10,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
        maxRedirections: options?.maxRedirections ?? 5,
      });
      this.ownsDispatcher = true;
    }
  }

  async getJson(url: string, options: HttpRequestOptions = {}): Promise<TransportResult<unknown>> {
    const sent = await this.send(url, options);
    if (!sent.ok) {
      return sent;
    }

    try {
      const bodyText = await sent.value.body.text();
      return transportSuccess<unknown>(JSON.parse(bodyText));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code =
        error instanceof SyntaxError ? TransportErrorCode.INVALID_BODY : TransportErrorCode.NETWORK_ERROR;
      return transportFailure({ code, message, url });
    }
  }

  async getStream(
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<TransportResult<StreamResponse>> {
    const sent = await this.send(url, options);
    if (!sent.ok) {
      return sent;
    }

    return transportSuccess({
      statusCode: sent.value.statusCode,
      headers: sent.value.headers,
      body: sent.value.body,
    });
  }

  private async send(
    url: string,
    options: HttpRequestOptions,
  ): Promise<TransportResult<Dispatcher.ResponseData>> {
    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch {
      return transportFailure({
        code: TransportErrorCode.NETWORK_ERROR,
        message: 'Invalid URL',
        url,
      });
    }

    const timeout = options.timeout ?? this.defaultTimeout;
    this.logger.debug({ url }, 'GET');

    let response: Dispatcher.ResponseData;
    try {
      response = await this.dispatcher.request({
        origin: parsedUrl.origin,
        path: parsedUrl.pathname + parsedUrl.search,
        method: 'GET',
        headers: { 'user-agent': this.userAgent, ...options.headers },
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug({ url, error: message }, 'HTTP request failed');
      return transportFailure({ code: TransportErrorCode.NETWORK_ERROR, message, url });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      await response.body.dump();
      return transportFailure({
        code: TransportErrorCode.HTTP_STATUS,
        message: `HTTP ${response.statusCode}`,
        statusCode: response.statusCode,
        url,
      });
    }

    return transportSuccess(response);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
