// packages/node-runtime/src/program.ts
import { Command, Option } from 'commander';
import {
  accessSync,
  constants as fsConstants,
  createReadStream,
  createWriteStream,
  existsSync,
  readFileSync,
  writeFileSync,
} from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { BLOCK_SIZE } from '../../core/src/config/defaults.js';
import { CipherRegistry } from '../../core/src/config/CipherRegistry.js';
import { FilesystemError, InvalidInputError } from '../../core/src/errors/index.js';
import { HEADER_SIZE } from '../../core/src/header/constants.js';
import { decodeHeader } from '../../core/src/header/decoder.js';
import { blockCount, plaintextSize } from '../../core/src/stream/positions.js';
import type { CipherName, StreamOptions } from '../../core/src/types/index.js';
import { base64Decode, base64Encode } from '../../core/src/util/bytes.js';
import type { Verbosity } from '../../core/src/util/logger.js';
import { FileStream } from './FileStream.js';
import {
  createDecryptingWriter,
  createEncryptingReader,
  generateKey,
} from './index.js';
import {
  nodeToWebReadable,
  nodeToWebWritable,
  toWebReadable,
  toWebWritable,
} from './streamAdapter.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

export interface CliIO {
  stdin  : Readable;
  stdout : Writable;
  stderr : Writable;
}

type GlobalOptions = {
  cipher   : CipherName;
  keyFile? : string;
  verbose  : number;
};

const LEVELS: readonly Verbosity[] = [0, 1, 2, 3, 4];

function assertWritable(out: string): string {
  const absOut    = resolve(out);
  const targetDir = dirname(absOut);

  if (!existsSync(targetDir)) {
    throw new FilesystemError(`Output directory does not exist: ${targetDir}`);
  }
  try {
    accessSync(targetDir, fsConstants.W_OK);
  } catch {
    throw new FilesystemError('Output directory is not writeable');
  }
  return absOut;
}

function readKey(path: string | undefined): Uint8Array {
  if (!path) {
    throw new InvalidInputError('No key given; use --key-file or SEEKBOX_KEY_FILE');
  }
  if (!existsSync(path)) {
    throw new FilesystemError(`Key file not found: ${path}`);
  }
  return base64Decode(readFileSync(path, 'utf8').trim());
}

/**
 * Build the `seekbox` command tree. Actions throw instead of exiting, so the
 * caller decides how errors are reported.
 */
export function buildProgram(
  io: CliIO = { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
): Command {
  const program = new Command();

  const streamOptions = (): StreamOptions => {
    const opts = program.opts<GlobalOptions>();
    return {
      cipher : opts.cipher,
      verbose: LEVELS[Math.min(opts.verbose, 4)],
      logger : msg => { io.stderr.write(msg + '\n'); },
    };
  };

  program
    .name('seekbox')
    .version(PKG_VERSION)
    .description(
      'Seekable block encryption for files\n' +
      `Blocks of ${BLOCK_SIZE} bytes, each sealed with its own nonce`,
    )
    .configureOutput({
      writeOut: str => { io.stdout.write(str); },
      writeErr: str => { io.stderr.write(str); },
    })

    .addOption(
      new Option('-c, --cipher <name>', 'block cipher')
        .choices(CipherRegistry.names())
        .default(CipherRegistry.current.id),
    )

    .addOption(
      new Option('-k, --key-file <path>', 'file holding the Base64 key')
        .env('SEEKBOX_KEY_FILE'),
    )

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser<number>((_value, previous) => previous + 1),
    );

  program
    .command('keygen')
    .description('Generate a random key; --out - for STDOUT')
    .option('-o, --out <file>', 'key file (default STDOUT)', '-')
    .action((cmd: { out: string }) => {
      const key = generateKey(program.opts<GlobalOptions>().cipher);
      const b64 = base64Encode(key) + '\n';
      key.fill(0);

      if (cmd.out === '-') {
        io.stdout.write(b64);
        return;
      }
      writeFileSync(assertWritable(cmd.out), b64, { mode: 0o600 });
    });

  program
    .command('encrypt <src>')
    .description('Encrypt a file; --out - for STDOUT')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .action(async (src: string, cmd: { out: string }) => {
      if (src === '-') {
        throw new InvalidInputError('encrypt needs a seekable input file, not STDIN');
      }
      if (!existsSync(src)) {
        throw new FilesystemError(`Input file not found: ${src}`);
      }

      const key    = readKey(program.opts<GlobalOptions>().keyFile);
      const source = FileStream.open(src, 'read');
      try {
        const reader   = createEncryptingReader(source, key, streamOptions());
        const toStdout = cmd.out === '-';
        const out      = toStdout ? io.stdout : createWriteStream(assertWritable(cmd.out));

        await toWebReadable(reader).pipeTo(nodeToWebWritable(out), { preventClose: toStdout });
      } finally {
        key.fill(0);
        source.close();
      }
    });

  program
    .command('decrypt <src>')
    .description('Decrypt a file; use - for STDIN. The output must be a file')
    .requiredOption('-o, --out <file>', 'output file')
    .action(async (src: string, cmd: { out: string }) => {
      if (src !== '-' && !existsSync(src)) {
        throw new FilesystemError(`Input file not found: ${src}`);
      }
      if (cmd.out === '-') {
        throw new InvalidInputError('decrypt needs an output file it can roll back, not STDOUT');
      }

      const key  = readKey(program.opts<GlobalOptions>().keyFile);
      const sink = FileStream.open(assertWritable(cmd.out), 'write');
      try {
        const writer = createDecryptingWriter(sink, key, streamOptions());
        const input  = src === '-' ? io.stdin : createReadStream(src);

        await nodeToWebReadable(input).pipeTo(toWebWritable(writer));
      } finally {
        key.fill(0);
        sink.close();
      }
    });

  program
    .command('inspect <src>')
    .description('Show header information and sizes without decrypting')
    .action((src: string) => {
      if (!existsSync(src)) {
        throw new FilesystemError(`Input file not found: ${src}`);
      }

      const file = FileStream.open(src, 'read');
      try {
        const header = decodeHeader(file.read(HEADER_SIZE));
        const size   = file.size;
        const plain  = plaintextSize(size);

        const meta = {
          version       : `${header.major}.${header.minor}`,
          fileNonce     : base64Encode(header.fileNonce),
          headerSize    : header.headerLen,
          blockSize     : BLOCK_SIZE,
          blocks        : blockCount(plain),
          ciphertextSize: size,
          plaintextSize : plain,
        };
        io.stdout.write(JSON.stringify(meta, null, 2) + '\n');
      } finally {
        file.close();
      }
    });

  return program;
}

/** `Error [<Name>]: <message>` */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `Error [${err.constructor.name}]: ${err.message}\n`;
  }
  return `Error [Unknown]: ${String(err)}\n`;
}
