/**
 * Formats a checksum as lowercase hex with a `0x` prefix.
 *
 * @example
 * formatHex(0x1a2b);
 * // '0x1a2b'
 * formatHex(0xf, { pad: true });
 * // '0x000f'
 */
export function formatHex(value: number, options: { pad?: boolean } = {}) {
  const digits = value.toString(16);
  return `0x${options.pad ? digits.padStart(4, '0') : digits}`;
}

/**
 * Parses a 16-bit hex string, with or without a `0x` prefix.
 *
 * Uses direct character code comparison instead of `parseInt`
 * for stricter validation.
 *
 * `parseInt` is too permissive and allows invalid hex characters
 * to slip through.
 *
 * Throws if invalid hex characters are encountered.
 */
export function parseHex(hex: string): number {
  const digits =
    hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;

  if (digits.length === 0) {
    throw new Error('empty hex string');
  }

  if (digits.length > 4) {
    throw new Error(`hex value longer than 16 bits: ${hex}`);
  }

  let value = 0;
  for (let i = 0; i < digits.length; i++) {
    const char = digits.charCodeAt(i);
    let digit: number;

    if (char >= 48 && char <= 57) {
      // 0-9
      digit = char - 48;
    } else if (char >= 97 && char <= 102) {
      // a-f
      digit = char - 87;
    } else if (char >= 65 && char <= 70) {
      // A-F
      digit = char - 55;
    } else {
      throw new Error(`invalid hex character in ${hex}`);
    }

    value = (value << 4) | digit;
  }

  return value;
}
