// packages/core/src/stream/EncryptingReader.ts
import { BLOCK_SIZE } from '../config/defaults.js';
import { CipherRegistry } from '../config/CipherRegistry.js';
import { FILE_NONCE_LENGTH, HEADER_SIZE } from '../header/constants.js';
import { encodeHeader } from '../header/encoder.js';
import { InvalidInputError, StreamClosedError } from '../errors/index.js';
import {
  Whence,
  type Aead,
  type CryptoProvider,
  type SeekableSource,
  type StreamOptions,
} from '../types/index.js';
import { createLogger, type Logger } from '../util/logger.js';
import { blockNonce } from './nonce.js';
import {
  blockIndexOf,
  blockStart,
  ciphertextSize,
  locate,
} from './positions.js';

const EMPTY = new Uint8Array(0);

/**
 * Seekable, encrypted view over a finite plaintext source.
 *
 * The reader exposes `header ‖ block₀ ‖ block₁ ‖ …` as one byte stream. Each
 * block is encrypted on demand when a read or seek reaches it; only the unread
 * suffix of the current block is kept in memory.
 *
 * The reader takes exclusive ownership of the source cursor. Seeking the source
 * while the reader is active corrupts `tell()` and later reads without any
 * error being raised.
 */
export class EncryptingReader {
  /** Plaintext length, fixed at construction */
  readonly sourceSize : number;
  readonly headerSize : number = HEADER_SIZE;
  /** Total ciphertext length including the header */
  readonly outputSize : number;

  private readonly cipher    : Aead;
  private readonly fileNonce : Uint8Array;
  private readonly header    : Uint8Array;
  private readonly log       : Logger;

  // unread ciphertext of the current block (initially: the header)
  private remaining : Uint8Array;
  private isClosed  = false;

  /**
   * @param source   - plaintext; its cursor is moved to 0
   * @param key      - secret of the cipher's key length
   * @param provider - CSPRNG for the per-stream nonce prefix
   * @throws {InvalidInputError} for a zero-length source or a wrong key length
   */
  constructor(
    private readonly source: SeekableSource,
    key: Uint8Array,
    provider: CryptoProvider,
    opt: StreamOptions = {},
  ) {
    this.log = createLogger(opt.verbose ?? 0, opt.logger, 'reader');

    this.sourceSize = this.source.seek(0, Whence.END);
    this.source.seek(0);
    if (this.sourceSize === 0) {
      throw new InvalidInputError('Zero-length sources are not supported');
    }

    const Cipher   = opt.cipher ? CipherRegistry.get(opt.cipher) : CipherRegistry.current;
    this.cipher    = new Cipher(key);
    this.fileNonce = provider.getRandomValues(new Uint8Array(FILE_NONCE_LENGTH));
    this.header    = encodeHeader(this.fileNonce);
    this.remaining = this.header;
    this.outputSize = ciphertextSize(this.sourceSize);

    this.log.log(1, `Encrypting ${this.sourceSize} bytes with ${Cipher.id}, output ${this.outputSize} bytes`);
  }

  get closed(): boolean { return this.isClosed; }

  get atSourceEnd(): boolean {
    return this.source.tell() === this.sourceSize;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Reading
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Fill `target` with the next ciphertext bytes.
   * @returns bytes written; 0 only at end of stream
   */
  readInto(target: Uint8Array): number {
    this.assertOpen();
    const length = target.length;

    // served entirely from the leftover block?
    if (length <= this.remaining.length) {
      target.set(this.remaining.subarray(0, length));
      this.remaining = this.remaining.subarray(length);
      return length;
    }

    target.set(this.remaining);
    let written = this.remaining.length;
    this.remaining = EMPTY;

    while (written < length && !this.atSourceEnd) {
      const block = this.nextBlock();
      const want  = length - written;

      if (want <= block.length) {
        target.set(block.subarray(0, want), written);
        this.remaining = block.subarray(want);
        written = length;
      } else {
        target.set(block, written);
        written += block.length;
      }
    }

    return written;
  }

  /**
   * Read up to `size` bytes; a negative size reads to the end.
   */
  read(size = -1): Uint8Array {
    this.assertOpen();
    if (size < 0) return this.readAll();
    const out = new Uint8Array(size);
    const n   = this.readInto(out);
    return n === size ? out : out.slice(0, n);
  }

  readAll(): Uint8Array {
    this.assertOpen();
    const out = new Uint8Array(this.outputSize - this.tell());
    this.readInto(out);
    return out;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Positioning
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Move to a ciphertext position. The target is clamped to
   * `[0, outputSize]`; landing inside a block re-encrypts that one block.
   * @returns the new absolute position
   */
  seek(offset: number, whence: Whence = Whence.SET): number {
    this.assertOpen();
    if (!Number.isSafeInteger(offset)) {
      throw new RangeError(`Invalid seek offset: ${offset}`);
    }

    const base =
      whence === Whence.SET ? 0 :
      whence === Whence.CUR ? this.tell() :
      this.outputSize;
    const position = Math.min(Math.max(base + offset, 0), this.outputSize);

    if (position <= this.headerSize) {
      // still in the header (or right at the start of block 0)
      this.source.seek(0);
      this.remaining = this.header.subarray(position);
      this.log.log(2, `Seek to ${position} (header)`);
      return position;
    }

    const { blockIndex, offsetInBlock } = locate(position);
    this.source.seek(blockIndex * BLOCK_SIZE);
    const block = this.nextBlock();
    this.remaining = block.subarray(offsetInBlock);
    this.log.log(2, `Seek to ${position} (block ${blockIndex} + ${offsetInBlock})`);
    return position;
  }

  /**
   * Current ciphertext position, derived from the source cursor and the
   * length of the unread block suffix.
   */
  tell(): number {
    this.assertOpen();
    const sourcePos = this.source.tell();

    if (sourcePos === 0) {
      return this.headerSize - this.remaining.length;
    }

    // The unread suffix belongs to the block *before* the cursor. Subtracting
    // one keeps an exactly full final block from rounding up past the end.
    const blockIndex = blockIndexOf(sourcePos - 1);
    const plainLen   = Math.min(BLOCK_SIZE, this.sourceSize - blockIndex * BLOCK_SIZE);
    const outLen     = plainLen + this.cipher.TAG_LENGTH;

    return blockStart(blockIndex) + outLen - this.remaining.length;
  }

  /**
   * Release the reader. The source stays open and belongs to the caller.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed  = true;
    this.remaining = EMPTY;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Read, encrypt and return the block starting at the source cursor.
   * The cursor must be block-aligned.
   */
  private nextBlock(): Uint8Array {
    if (this.atSourceEnd) return EMPTY;

    const sourcePos = this.source.tell();
    if (sourcePos % BLOCK_SIZE !== 0) {
      throw new Error(`Source cursor ${sourcePos} is not block-aligned`);
    }
    const blockIndex = sourcePos / BLOCK_SIZE;
    const expected   = Math.min(BLOCK_SIZE, this.sourceSize - sourcePos);

    // capacity is checked before anything is read
    const nonce = blockNonce(this.fileNonce, blockIndex, sourcePos + expected === this.sourceSize);

    const data = this.readBlock();
    if (data.length !== expected) {
      throw new Error(`Source changed size: expected ${expected} bytes at ${sourcePos}, got ${data.length}`);
    }

    this.log.log(3, `Encrypting block ${blockIndex} (${data.length} bytes)`);
    return this.cipher.seal(nonce, data);
  }

  /** Pull up to BLOCK_SIZE bytes, tolerating sources that return short reads. */
  private readBlock(): Uint8Array {
    const first = this.source.read(BLOCK_SIZE);
    if (first.length === BLOCK_SIZE || first.length === 0) return first;

    const buf = new Uint8Array(BLOCK_SIZE);
    buf.set(first);
    let filled = first.length;
    while (filled < BLOCK_SIZE) {
      const more = this.source.read(BLOCK_SIZE - filled);
      if (more.length === 0) break;
      buf.set(more, filled);
      filled += more.length;
    }
    return filled === BLOCK_SIZE ? buf : buf.slice(0, filled);
  }

  private assertOpen(): void {
    if (this.isClosed) throw new StreamClosedError('I/O operation on closed reader');
  }
}
