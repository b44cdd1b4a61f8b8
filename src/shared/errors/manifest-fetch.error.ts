import { describeFailure, TransportFailure } from '../interfaces/transport-result.interface';

/**
 * The only failure allowed to end a run: without a manifest there is
 * nothing to process.
 */
export class ManifestFetchError extends Error {
  readonly failure: TransportFailure;

  constructor(failure: TransportFailure) {
    super(`Error downloading metadata: ${describeFailure(failure)}`);
    this.name = 'ManifestFetchError';
    this.failure = failure;
  }
}
