import { ChecksumError, ChecksumErrorCode } from './errors.js';

/**
 * Any ordered sequence of byte values.
 *
 * `Uint8Array` is the usual input. Plain arrays are accepted too,
 * but every element is checked to be an integer in [0, 255].
 */
export type ByteSource = Uint8Array | ArrayLike<number>;

export type ChecksumMode = 'byte' | 'word';

/**
 * What to do with an unpaired final byte in word-wise mode.
 *
 * - `drop`: ignore it. Images are expected to have an even length.
 * - `error`: throw `InvalidInputLength`.
 */
export type OddLengthPolicy = 'drop' | 'error';

export type WordWiseOptions = {
  /**
   * Handling of odd-length input.
   *
   * @default 'drop'
   */
  oddLength?: OddLengthPolicy;
};

export type ChecksumOptions = WordWiseOptions & {
  mode: ChecksumMode;
};

export type ChecksumResult = {
  mode: ChecksumMode;
  checksum: number;
  complement: number;
  /**
   * Number of bytes consumed, including a dropped trailing byte.
   */
  length: number;
  droppedTrailingByte: boolean;
};

export const CHECKSUM_MASK = 0xffff;

/**
 * Reads the byte at `index`, verifying that it is an
 * integer in [0, 255].
 *
 * `offset` only affects the index reported on failure.
 */
export function byteAt(bytes: ByteSource, index: number, offset = 0): number {
  const value = bytes[index];

  if (
    value === undefined ||
    !Number.isInteger(value) ||
    value < 0 ||
    value > 0xff
  ) {
    throw new ChecksumError(
      ChecksumErrorCode.InvalidByteValue,
      `invalid byte value ${value} at index ${offset + index}`
    );
  }

  return value;
}

/**
 * Sums every byte as an independent 8-bit value, modulo 65536.
 *
 * @example
 * computeByteWise(new Uint8Array([0xff, 0x02]));
 * // 0x0101
 */
export function computeByteWise(bytes: ByteSource): number {
  let sum = 0;

  for (let i = 0; i < bytes.length; i++) {
    sum = (sum + byteAt(bytes, i)) & CHECKSUM_MASK;
  }

  return sum;
}

/**
 * Sums consecutive byte pairs as big-endian 16-bit words, modulo 65536.
 *
 * @example
 * computeWordWise(new Uint8Array([0x01, 0x02]));
 * // 0x0102
 */
export function computeWordWise(
  bytes: ByteSource,
  options: WordWiseOptions = {}
): number {
  const { oddLength = 'drop' } = options;
  const pairedLength = bytes.length - (bytes.length % 2);

  if (pairedLength !== bytes.length) {
    if (oddLength === 'error') {
      throw new ChecksumError(
        ChecksumErrorCode.InvalidInputLength,
        `odd input length ${bytes.length} in word-wise mode`
      );
    }

    // Dropped, but still has to be a byte
    byteAt(bytes, pairedLength);
  }

  let sum = 0;

  for (let i = 0; i < pairedLength; i += 2) {
    const word = (byteAt(bytes, i) << 8) | byteAt(bytes, i + 1);
    sum = (sum + word) & CHECKSUM_MASK;
  }

  return sum;
}

/**
 * Returns the bitwise complement of a 16-bit checksum.
 */
export function complement(checksum: number): number {
  if (
    !Number.isInteger(checksum) ||
    checksum < 0 ||
    checksum > CHECKSUM_MASK
  ) {
    throw new ChecksumError(
      ChecksumErrorCode.InvalidChecksumValue,
      `invalid checksum value ${checksum}`
    );
  }

  return checksum ^ CHECKSUM_MASK;
}

/**
 * Computes the checksum of `bytes` in the given mode, along
 * with its complement.
 */
export function computeChecksum(
  bytes: ByteSource,
  options: ChecksumOptions
): ChecksumResult {
  const { mode } = options;

  const checksum =
    mode === 'word'
      ? computeWordWise(bytes, options)
      : computeByteWise(bytes);

  return {
    mode,
    checksum,
    complement: complement(checksum),
    length: bytes.length,
    droppedTrailingByte: mode === 'word' && bytes.length % 2 === 1,
  };
}
