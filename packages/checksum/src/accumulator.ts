import {
  byteAt,
  CHECKSUM_MASK,
  complement,
  type ByteSource,
  type ChecksumMode,
  type ChecksumOptions,
  type ChecksumResult,
  type OddLengthPolicy,
} from './checksum.js';
import { ChecksumError, ChecksumErrorCode } from './errors.js';

/**
 * Computes a checksum over input that arrives in chunks.
 *
 * In word-wise mode an unpaired byte at the end of one chunk is
 * held until the next, so the result does not depend on how the
 * input was split.
 *
 * @example
 * const accumulator = new ChecksumAccumulator({ mode: 'word' });
 * accumulator.update(new Uint8Array([0x01]));
 * accumulator.update(new Uint8Array([0x02]));
 * accumulator.digest().checksum;
 * // 0x0102
 */
export class ChecksumAccumulator {
  readonly mode: ChecksumMode;

  #oddLength: OddLengthPolicy;
  #sum = 0;
  #length = 0;
  #pending: number | undefined;
  #finalized = false;

  constructor(options: ChecksumOptions) {
    this.mode = options.mode;
    this.#oddLength = options.oddLength ?? 'drop';
  }

  /**
   * Total number of bytes passed to `update()` so far.
   */
  get length() {
    return this.#length;
  }

  get finalized() {
    return this.#finalized;
  }

  /**
   * Adds a chunk of bytes.
   *
   * A chunk containing an invalid byte value is rejected as a
   * whole and leaves the accumulator unchanged.
   */
  update(chunk: ByteSource): this {
    this.#assertOpen();

    if (this.mode === 'byte') {
      this.#sum = sumBytes(this.#sum, chunk, this.#length);
    } else {
      const { sum, pending } = sumWords(
        this.#sum,
        this.#pending,
        chunk,
        this.#length
      );
      this.#sum = sum;
      this.#pending = pending;
    }

    this.#length += chunk.length;
    return this;
  }

  /**
   * The checksum of every complete unit seen so far.
   */
  value(): number {
    return this.#sum;
  }

  /**
   * Finishes the computation. The accumulator can not be
   * updated afterwards.
   */
  digest(): ChecksumResult {
    this.#assertOpen();
    this.#finalized = true;

    const droppedTrailingByte = this.#pending !== undefined;

    if (droppedTrailingByte && this.#oddLength === 'error') {
      throw new ChecksumError(
        ChecksumErrorCode.InvalidInputLength,
        `odd input length ${this.#length} in word-wise mode`
      );
    }

    return {
      mode: this.mode,
      checksum: this.#sum,
      complement: complement(this.#sum),
      length: this.#length,
      droppedTrailingByte,
    };
  }

  #assertOpen() {
    if (this.#finalized) {
      throw new ChecksumError(
        ChecksumErrorCode.AccumulatorFinalized,
        'checksum accumulator already finalized'
      );
    }
  }
}

function sumBytes(initial: number, chunk: ByteSource, offset: number) {
  let sum = initial;

  for (let i = 0; i < chunk.length; i++) {
    sum = (sum + byteAt(chunk, i, offset)) & CHECKSUM_MASK;
  }

  return sum;
}

function sumWords(
  initial: number,
  carried: number | undefined,
  chunk: ByteSource,
  offset: number
) {
  let sum = initial;
  let high = carried;

  for (let i = 0; i < chunk.length; i++) {
    const byte = byteAt(chunk, i, offset);

    if (high === undefined) {
      high = byte;
      continue;
    }

    sum = (sum + ((high << 8) | byte)) & CHECKSUM_MASK;
    high = undefined;
  }

  return { sum, pending: high };
}
