import { ChecksumAccumulator } from './accumulator.js';
import type { ChecksumOptions, ChecksumResult } from './checksum.js';

export type ByteChunkSource =
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array>;

/**
 * Drains a stream of byte chunks and returns its checksum.
 *
 * A `ReadableStream` is always unlocked again once this settles,
 * and is cancelled if reading stops before the end.
 *
 * @example
 * const file = await fs.open('image.sfc');
 * const result = await computeChecksumFromStream(file.readableWebStream(), {
 *   mode: 'byte',
 * });
 */
export async function computeChecksumFromStream(
  source: ByteChunkSource,
  options: ChecksumOptions
): Promise<ChecksumResult> {
  const accumulator = new ChecksumAccumulator(options);
  const chunks = 'getReader' in source ? readChunks(source) : source;

  for await (const chunk of chunks) {
    accumulator.update(chunk);
  }

  return accumulator.digest();
}

async function* readChunks(
  readable: ReadableStream<Uint8Array>
): AsyncGenerator<Uint8Array> {
  const reader = readable.getReader();

  // Closed or errored streams have nothing left to cancel
  let open = true;

  try {
    while (true) {
      const { done, value } = await reader.read().catch((err: unknown) => {
        open = false;
        throw err;
      });

      if (done) {
        open = false;
        return;
      }

      yield value;
    }
  } finally {
    try {
      if (open) {
        await reader.cancel();
      }
    } finally {
      reader.releaseLock();
    }
  }
}
