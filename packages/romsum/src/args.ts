import type { ChecksumMode } from '@romsum/checksum';
import { parseArgs } from 'node:util';
import { parseHex } from './format.js';

export type PrintTarget = 'both' | 'checksum' | 'complement';

export type CliOptions = {
  /**
   * Path of the image to checksum.
   */
  file: string;

  /**
   * Accumulation mode.
   *
   * @default 'byte'
   */
  mode: ChecksumMode;

  /**
   * Fail on an unpaired trailing byte in word-wise mode
   * instead of dropping it.
   */
  strict: boolean;

  /**
   * Count a non-power-of-two trailing section twice.
   * Byte-wise mode only.
   */
  mirror: boolean;

  /**
   * Which values to print.
   *
   * @default 'both'
   */
  print: PrintTarget;

  /**
   * Checksum the image is expected to have.
   */
  expect?: number;

  /**
   * Zero-pad hex output to four digits.
   */
  pad: boolean;
};

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions);

export const USAGE = `Usage: romsum [options] <file>

Options:
  -m, --mode <byte|word>                 accumulation mode (default: byte)
      --strict                           fail on an unpaired byte in word mode
      --mirror                           count a non-power-of-two tail twice
  -p, --print <both|checksum|complement> values to print (default: both)
  -e, --expect <hex>                     exit with 1 if the checksum differs
      --pad                              zero-pad output to four hex digits
  -h, --help                             show this help`;

const MODES: readonly ChecksumMode[] = ['byte', 'word'];
const PRINT_TARGETS: readonly PrintTarget[] = [
  'both',
  'checksum',
  'complement',
];

/**
 * Parses command line arguments (without the node and
 * script paths) into CLI options.
 *
 * Throws on unknown options or invalid values.
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      mode: { type: 'string', short: 'm' },
      strict: { type: 'boolean' },
      mirror: { type: 'boolean' },
      print: { type: 'string', short: 'p' },
      expect: { type: 'string', short: 'e' },
      pad: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    return { help: true };
  }

  const [file, ...rest] = positionals;

  if (file === undefined || rest.length > 0) {
    throw new Error('expected exactly one file');
  }

  const mode = parseChoice(values.mode ?? 'byte', MODES, 'mode');
  const print = parseChoice(values.print ?? 'both', PRINT_TARGETS, 'print');
  const mirror = values.mirror ?? false;

  if (mirror && mode !== 'byte') {
    throw new Error('mirrored sum is only available in byte mode');
  }

  return {
    help: false,
    file,
    mode,
    strict: values.strict ?? false,
    mirror,
    print,
    expect: values.expect === undefined ? undefined : parseHex(values.expect),
    pad: values.pad ?? false,
  };
}

function parseChoice<T extends string>(
  value: string,
  choices: readonly T[],
  name: string
): T {
  const choice = choices.find((c) => c === value);

  if (choice === undefined) {
    throw new Error(
      `invalid ${name}: ${value} (expected ${choices.join(', ')})`
    );
  }

  return choice;
}
