import { describe, expect, test } from 'vitest';
import { computeChecksumFromStream } from './stream.js';

function streamOf(chunks: number[][]) {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(Uint8Array.from(chunk));
      }
      controller.close();
    },
  });
}

async function* iterableOf(chunks: number[][]) {
  for (const chunk of chunks) {
    yield Uint8Array.from(chunk);
  }
}

describe('computeChecksumFromStream', () => {
  test('reads a ReadableStream to the end', async () => {
    const result = await computeChecksumFromStream(
      streamOf([[0x12], [0x34, 0x56]]),
      { mode: 'byte' }
    );

    expect(result).toEqual({
      mode: 'byte',
      checksum: 0x009c,
      complement: 0xff63,
      length: 3,
      droppedTrailingByte: false,
    });
  });

  test('reads an async iterable to the end', async () => {
    const result = await computeChecksumFromStream(
      iterableOf([[0xff], [0xff, 0x00], [0x01]]),
      { mode: 'word' }
    );

    expect(result.checksum).toBe(0);
    expect(result.complement).toBe(0xffff);
    expect(result.length).toBe(4);
  });

  test('returns 0 for an empty stream', async () => {
    const result = await computeChecksumFromStream(streamOf([]), {
      mode: 'word',
    });

    expect(result.checksum).toBe(0);
    expect(result.length).toBe(0);
  });

  test('unlocks the stream after reading it', async () => {
    let cancelled = false;
    const readable = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(Uint8Array.from([1, 2]));
        controller.close();
      },
      cancel() {
        cancelled = true;
      },
    });

    await computeChecksumFromStream(readable, { mode: 'byte' });

    expect(readable.locked).toBe(false);
    expect(cancelled).toBe(false);
  });

  test('unlocks the stream when it errors partway', async () => {
    let pulls = 0;
    const readable = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (pulls++ === 0) {
          controller.enqueue(Uint8Array.from([1]));
        } else {
          controller.error(new Error('disk failure'));
        }
      },
    });

    await expect(
      computeChecksumFromStream(readable, { mode: 'byte' })
    ).rejects.toThrow('disk failure');
    expect(readable.locked).toBe(false);
  });

  test('rejects odd length input when strict', async () => {
    await expect(
      computeChecksumFromStream(streamOf([[1, 2], [3]]), {
        mode: 'word',
        oddLength: 'error',
      })
    ).rejects.toThrow('odd input length 3 in word-wise mode');
  });
});
