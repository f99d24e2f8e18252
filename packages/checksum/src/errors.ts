// Intentionally not using enum to avoid need for a transpiler
export const ChecksumErrorCode = {
  InvalidByteValue: 'InvalidByteValue',
  InvalidInputLength: 'InvalidInputLength',
  InvalidChecksumValue: 'InvalidChecksumValue',
  InvalidImageSize: 'InvalidImageSize',
  AccumulatorFinalized: 'AccumulatorFinalized',
} as const;

export type ChecksumErrorCode =
  (typeof ChecksumErrorCode)[keyof typeof ChecksumErrorCode];

export class ChecksumError extends Error {
  readonly code: ChecksumErrorCode;

  constructor(code: ChecksumErrorCode, message: string) {
    super(message);
    this.name = 'ChecksumError';
    this.code = code;
  }
}

export function isChecksumError(err: unknown): err is ChecksumError {
  return err instanceof ChecksumError;
}
