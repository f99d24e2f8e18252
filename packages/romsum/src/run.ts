import {
  complement,
  computeChecksumFromStream,
  computeMirroredByteWise,
  type ChecksumResult,
} from '@romsum/checksum';
import { parseCliArgs, USAGE, type CliOptions } from './args.js';
import { formatHex } from './format.js';
import { openFileStream, readFileBytes } from './read-file.js';

/**
 * Where the CLI reads images from and writes output to.
 */
export type CliIO = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  openStream: (path: string) => ReadableStream<Uint8Array>;
  readFile: (path: string) => Promise<Uint8Array>;
};

export const ExitCode = {
  OK: 0,
  MISMATCH: 1,
  FAILURE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  openStream: openFileStream,
  readFile: readFileBytes,
};

/**
 * Runs the CLI and resolves to its exit code.
 */
export async function run(
  argv: string[],
  io: CliIO = defaultIO
): Promise<ExitCode> {
  let options: CliOptions;

  try {
    const parsed = parseCliArgs(argv);

    if (parsed.help) {
      io.stdout(USAGE);
      return ExitCode.OK;
    }

    options = parsed;
  } catch (err) {
    io.stderr(`romsum: ${errorMessage(err)}`);
    io.stderr(USAGE);
    return ExitCode.FAILURE;
  }

  let result: ChecksumResult;

  try {
    result = await checksumFile(options, io);
  } catch (err) {
    io.stderr(`romsum: ${errorMessage(err)}`);
    return ExitCode.FAILURE;
  }

  if (result.droppedTrailingByte) {
    io.stderr(
      'romsum: warning: dropped unpaired trailing byte in word-wise mode'
    );
  }

  const format = (value: number) => formatHex(value, { pad: options.pad });

  if (options.print !== 'complement') {
    io.stdout(format(result.checksum));
  }
  if (options.print !== 'checksum') {
    io.stdout(format(result.complement));
  }

  if (options.expect !== undefined && options.expect !== result.checksum) {
    io.stderr(
      `romsum: checksum mismatch: expected ${format(options.expect)}, got ${format(result.checksum)}`
    );
    return ExitCode.MISMATCH;
  }

  return ExitCode.OK;
}

/**
 * Computes the checksum of the file named in `options`.
 *
 * Streams the file, except for the mirrored sum which
 * needs the image size up front.
 */
export async function checksumFile(
  options: CliOptions,
  io: Pick<CliIO, 'openStream' | 'readFile'> = defaultIO
): Promise<ChecksumResult> {
  if (options.mirror) {
    const bytes = await io.readFile(options.file);
    const checksum = computeMirroredByteWise(bytes);

    return {
      mode: 'byte',
      checksum,
      complement: complement(checksum),
      length: bytes.length,
      droppedTrailingByte: false,
    };
  }

  return await computeChecksumFromStream(io.openStream(options.file), {
    mode: options.mode,
    oddLength: options.strict ? 'error' : 'drop',
  });
}

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
