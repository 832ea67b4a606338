// packages/node-runtime/src/index.ts
import {
  DecryptingWriter,
  EncryptingReader,
  generateKey as generateKeyWith,
  type ByteSink,
  type CipherName,
  type SeekableSource,
  type StreamOptions,
} from '../../core/src/index.js';
import { nodeProvider } from './provider.js';

export function createEncryptingReader(
  source: SeekableSource,
  key: Uint8Array,
  cfg?: StreamOptions,
): EncryptingReader {
  return new EncryptingReader(source, key, nodeProvider, cfg);
}

export function createDecryptingWriter(
  sink: ByteSink,
  key: Uint8Array,
  cfg?: StreamOptions,
): DecryptingWriter {
  return new DecryptingWriter(sink, key, cfg);
}

export function generateKey(cipher?: CipherName): Uint8Array {
  return generateKeyWith(nodeProvider, cipher);
}

// Everything from core except its provider-taking generateKey.
export {
  BLOCK_SIZE,
  TAG_SIZE,
  OUTPUT_BLOCK_SIZE,
  HEADER_SIZE,
  FILE_NONCE_LENGTH,
  VERSION_MAJOR,
  VERSION_MINOR,
  CipherRegistry,
  encodeHeader,
  decodeHeader,
  XSalsa20Poly1305,
  XChaCha20Poly1305,
  EncryptingReader,
  DecryptingWriter,
  blockCount,
  blockIndexOf,
  blockStart,
  ciphertextSize,
  locate,
  plaintextSize,
  blockNonce,
  MAX_COUNTER,
  MemoryStream,
  ByteQueue,
  base64Encode,
  base64Decode,
  createLogger,
  Whence,
  SeekboxError,
  InvalidInputError,
  CapacityExceededError,
  MalformedHeaderError,
  AuthenticationError,
  IncompleteStreamError,
  StreamClosedError,
  CipherError,
  FilesystemError,
  type StreamHeader,
  type WriterStatus,
  type BlockLocation,
  type Logger,
  type LogSink,
  type Verbosity,
  type Aead,
  type ByteSink,
  type CipherConstructor,
  type CipherName,
  type CryptoProvider,
  type SeekableSource,
  type StreamOptions,
} from '../../core/src/index.js';
export { nodeProvider } from './provider.js';
export { FileStream } from './FileStream.js';
export {
  toWebReadable,
  toWebWritable,
  nodeToWebReadable,
  nodeToWebWritable,
} from './streamAdapter.js';
