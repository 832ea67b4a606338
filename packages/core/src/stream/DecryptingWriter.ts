// packages/core/src/stream/DecryptingWriter.ts
import { BLOCK_SIZE, OUTPUT_BLOCK_SIZE, TAG_SIZE } from '../config/defaults.js';
import { CipherRegistry } from '../config/CipherRegistry.js';
import { HEADER_SIZE } from '../header/constants.js';
import { decodeHeader } from '../header/decoder.js';
import {
  AuthenticationError,
  IncompleteStreamError,
  StreamClosedError,
} from '../errors/index.js';
import type { Aead, ByteSink, StreamOptions } from '../types/index.js';
import { ByteQueue } from '../util/ByteQueue.js';
import { createLogger, type Logger } from '../util/logger.js';
import { blockNonce } from './nonce.js';

type WriterState =
  | { kind: 'awaiting-header' }
  | { kind: 'streaming'; fileNonce: Uint8Array }
  | { kind: 'complete' }
  | { kind: 'failed' };

export type WriterStatus = WriterState['kind'];

/**
 * Incremental decoder: ciphertext goes in through {@link write} in chunks of
 * any size, verified plaintext comes out into the sink one block at a time.
 *
 * The stream carries no length field. A block that fails under the regular
 * nonce is retried under the final-block nonce; if that verifies, the stream is
 * complete. {@link endStream} must be called once all ciphertext has been
 * delivered: it forces the buffered tail through the final-block path and
 * fails unless a final block was seen.
 *
 * On any authentication failure the sink is rewound and truncated to zero
 * before the error is raised. The sink itself is never closed.
 */
export class DecryptingWriter {
  private state : WriterState = { kind: 'awaiting-header' };
  private readonly queue = new ByteQueue(OUTPUT_BLOCK_SIZE);
  private readonly cipher : Aead;
  private readonly log    : Logger;
  private isClosed = false;

  /**
   * @param sink - receives plaintext; must start empty at position 0
   * @param key  - secret of the cipher's key length
   * @throws {InvalidInputError} for a wrong key length
   */
  constructor(
    private readonly sink: ByteSink,
    key: Uint8Array,
    opt: StreamOptions = {},
  ) {
    const Cipher = opt.cipher ? CipherRegistry.get(opt.cipher) : CipherRegistry.current;
    this.cipher  = new Cipher(key);
    this.log     = createLogger(opt.verbose ?? 0, opt.logger, 'writer');
  }

  get closed(): boolean { return this.isClosed; }

  get status(): WriterStatus { return this.state.kind; }

  // ════════════════════════════════════════════════════════════════════════
  //  Writing
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Consume a chunk of ciphertext.
   * @returns `data.length`
   * @throws {MalformedHeaderError} on a bad header
   * @throws {AuthenticationError} if a block fails to verify (sink rolled back)
   * @throws {AuthenticationError} for data after the final block (sink rolled back)
   * @throws {CapacityExceededError} past the last addressable block
   */
  write(data: Uint8Array): number {
    // Checked before assertOpen: a completed writer is already closed.
    if (this.isComplete() && data.length > 0) {
      this.fail(new AuthenticationError(
        `Unexpected ${data.length} bytes after the final block`,
      ));
    }
    this.assertOpen();

    // Feed the queue in slices so it never holds more than one block.
    let offset = 0;
    while (offset < data.length) {
      if (this.isComplete()) {
        this.fail(new AuthenticationError(
          `Unexpected ${data.length - offset} bytes after the final block`,
        ));
      }
      const room = this.capacity() - this.queue.length;
      const take = Math.min(room, data.length - offset);
      this.queue.push(data.subarray(offset, offset + take));
      offset += take;
      this.process();
    }

    return data.length;
  }

  /**
   * Declare the ciphertext complete. Verifies that the final block was seen
   * and closes the writer.
   * @throws {IncompleteStreamError} if the stream was cut short or its
   *   buffered tail fails to verify as the final block (sink rolled back)
   */
  endStream(): void {
    if (this.isComplete()) {
      this.close();
      return;
    }
    this.assertOpen();

    try {
      if (this.state.kind === 'streaming' && this.queue.length > 0) {
        this.writeFinalResidue(this.state.fileNonce);
      }
      if (!this.isComplete()) {
        this.log.log(0, `Stream ended after ${this.tell()} bytes without a final block`);
        this.fail(new IncompleteStreamError(
          'Stream ended before its final block; discarded the plaintext written so far.',
        ));
      }
    } finally {
      this.close();
    }
  }

  /**
   * Roll back everything written to the sink and close without raising.
   */
  discard(): void {
    this.rollback();
    this.close();
  }

  flush(): void {
    this.assertOpen();
    this.sink.flush();
  }

  /**
   * Flush the sink and stop accepting data. Idempotent; the sink stays open.
   */
  close(): void {
    if (this.isClosed) return;
    try {
      this.sink.flush();
    } finally {
      this.isClosed = true;
    }
  }

  /**
   * Ciphertext bytes consumed so far, including the buffered partial block.
   * Still answers after close.
   */
  tell(): number {
    if (this.state.kind === 'awaiting-header') return this.queue.length;

    const sinkPos = this.sink.tell();
    const blocks  = this.isComplete()
      ? Math.ceil(sinkPos / BLOCK_SIZE)
      : this.committedBlocks();
    return HEADER_SIZE + sinkPos + blocks * TAG_SIZE + this.queue.length;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  State machine
  // ════════════════════════════════════════════════════════════════════════

  private capacity(): number {
    return this.state.kind === 'awaiting-header' ? HEADER_SIZE : OUTPUT_BLOCK_SIZE;
  }

  private process(): void {
    if (this.state.kind === 'awaiting-header') {
      if (this.queue.length < HEADER_SIZE) return;
      try {
        const { fileNonce } = decodeHeader(this.queue.shift(HEADER_SIZE));
        this.state = { kind: 'streaming', fileNonce };
        this.log.log(2, 'Header parsed');
      } catch (err) {
        this.abandon();
        throw err;
      }
      return;
    }

    if (this.state.kind === 'streaming' && this.queue.length >= OUTPUT_BLOCK_SIZE) {
      this.writeBlock(this.state.fileNonce, this.queue.shift(OUTPUT_BLOCK_SIZE), false);
    }
  }

  /**
   * Decrypt one block at the position given by the sink and append it.
   * Unless `knownFinal`, the regular nonce is tried first.
   */
  private writeBlock(fileNonce: Uint8Array, block: Uint8Array, knownFinal: boolean): void {
    const blockIndex = this.committedBlocks();

    let regular: Uint8Array;
    let final: Uint8Array;
    try {
      regular = blockNonce(fileNonce, blockIndex, false);
      final   = blockNonce(fileNonce, blockIndex, true);
    } catch (err) {
      this.abandon();
      throw err;
    }

    if (!knownFinal) {
      const plain = this.tryOpen(regular, block);
      if (plain) {
        this.append(plain);
        this.log.log(3, `Decrypted block ${blockIndex} (${plain.length} bytes)`);
        return;
      }
    }

    const plain = this.tryOpen(final, block);
    if (!plain) {
      this.log.log(0, `Block ${blockIndex} failed authentication`);
      this.fail(new AuthenticationError(
        `Failed to decrypt block ${blockIndex}: data corrupted or tampered with; ` +
        'discarded the plaintext written so far.',
      ));
    }

    this.append(plain);
    if (this.queue.length !== 0) {
      throw new Error(`${this.queue.length} bytes left buffered after the final block`);
    }
    this.state = { kind: 'complete' };
    this.log.log(1, `Stream complete after ${blockIndex + 1} blocks`);
    this.close();
  }

  /** Only the final nonce is tried here, so a failure means the stream is short. */
  private writeFinalResidue(fileNonce: Uint8Array): void {
    const residue = this.queue.drain();
    try {
      this.writeBlock(fileNonce, residue, true);
    } catch (err) {
      if (!(err instanceof AuthenticationError)) throw err;
      throw new IncompleteStreamError(
        `Stream ended on a ${residue.length}-byte tail that is not a valid final block; ` +
        'discarded the plaintext written so far.',
      );
    }
  }

  private tryOpen(nonce: Uint8Array, block: Uint8Array): Uint8Array | null {
    try {
      return this.cipher.open(nonce, block);
    } catch (err) {
      if (err instanceof AuthenticationError) return null;
      throw err;
    }
  }

  private append(plain: Uint8Array): void {
    const n = this.sink.write(plain);
    if (n !== plain.length) {
      throw new Error(`Short write to sink: ${n} of ${plain.length} bytes`);
    }
  }

  /** Blocks already committed, i.e. index of the next block. */
  private committedBlocks(): number {
    const sinkPos = this.sink.tell();
    if (sinkPos % BLOCK_SIZE !== 0) {
      throw new Error(`Sink position ${sinkPos} is not block-aligned`);
    }
    return sinkPos / BLOCK_SIZE;
  }

  private isComplete(): boolean {
    return this.state.kind === 'complete';
  }

  /** Terminal failure without rollback (nothing unverified was written). */
  private abandon(): void {
    this.state = { kind: 'failed' };
    this.queue.clear();
    this.close();
  }

  /** Terminal failure: roll back the sink, close, raise. */
  private fail(err: Error): never {
    try {
      this.rollback();
    } finally {
      this.queue.clear();
      this.close();
    }
    throw err;
  }

  private rollback(): void {
    this.state = { kind: 'failed' };
    this.sink.seek(0);
    this.sink.truncate(0);
  }

  private assertOpen(): void {
    if (this.isClosed) throw new StreamClosedError('I/O operation on closed writer');
  }
}
