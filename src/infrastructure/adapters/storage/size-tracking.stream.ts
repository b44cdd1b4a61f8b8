import { Transform } from 'stream';

/**
 * Create a Transform stream that tracks bytes passing through it
 */
export function createSizeTrackingStream(onBytesProcessed: (bytes: number) => void): Transform {
  let bytesProcessed = 0;

  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      bytesProcessed += chunk.length;
      onBytesProcessed(bytesProcessed);
      callback(null, chunk);
    },
  });
}
