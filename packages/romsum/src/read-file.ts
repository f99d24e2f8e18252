import { createReadStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Readable } from 'node:stream';

/**
 * Opens a file as a web `ReadableStream` of byte chunks.
 */
export function openFileStream(path: string): ReadableStream<Uint8Array> {
  const nodeStream = createReadStream(path);
  return Readable.toWeb(nodeStream);
}

/**
 * Reads a whole file into memory.
 */
export async function readFileBytes(path: string): Promise<Uint8Array> {
  const buffer = await readFile(path);
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}
