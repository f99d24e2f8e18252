import { byteAt, CHECKSUM_MASK, type ByteSource } from './checksum.js';
import { ChecksumError, ChecksumErrorCode } from './errors.js';

/**
 * Smallest section a mirrored image is split into (32 KiB).
 */
export const MIN_SECTION_LENGTH = 0x8000;

export type MirrorSections = {
  /**
   * Length of the leading power-of-two section.
   */
  first: number;

  /**
   * Length of the trailing section, or 0 when the
   * image is already a power of two.
   */
  second: number;
};

/**
 * Splits an image length into a leading power-of-two section
 * and a smaller power-of-two remainder.
 *
 * Throws if the length can not be split that way.
 */
export function getMirrorSections(length: number): MirrorSections {
  let first = MIN_SECTION_LENGTH;
  while (first * 2 <= length) {
    first *= 2;
  }

  if (first === length) {
    return { first, second: 0 };
  }

  let second = MIN_SECTION_LENGTH;
  while (second * 2 + first <= length) {
    second *= 2;
  }

  if (first + second !== length) {
    throw new ChecksumError(
      ChecksumErrorCode.InvalidImageSize,
      `unsupported image size for mirrored sum: ${length}`
    );
  }

  return { first, second };
}

/**
 * Byte-wise checksum of an image whose size is not a power of two.
 *
 * The trailing section is counted twice, as if mirrored to fill the
 * address space up to the next power of two. For power-of-two images
 * this is the plain byte-wise sum.
 */
export function computeMirroredByteWise(bytes: ByteSource): number {
  const { first } = getMirrorSections(bytes.length);

  const firstSum = sumRange(bytes, 0, first);
  const secondSum = sumRange(bytes, first, bytes.length);

  return (firstSum + secondSum * 2) & CHECKSUM_MASK;
}

function sumRange(bytes: ByteSource, start: number, end: number) {
  let sum = 0;

  for (let i = start; i < end; i++) {
    sum = (sum + byteAt(bytes, i)) & CHECKSUM_MASK;
  }

  return sum;
}
