// packages/core/src/index.ts

import './config/defaults.js';

export {
  BLOCK_SIZE,
  TAG_SIZE,
  OUTPUT_BLOCK_SIZE,
} from './config/defaults.js';
export { CipherRegistry } from './config/CipherRegistry.js';
export {
  HEADER_SIZE,
  FILE_NONCE_LENGTH,
  VERSION_MAJOR,
  VERSION_MINOR,
} from './header/constants.js';
export { encodeHeader } from './header/encoder.js';
export { decodeHeader, type StreamHeader } from './header/decoder.js';

export { XSalsa20Poly1305 } from './algorithms/aead/xsalsa20poly1305/XSalsa20-Poly1305.js';
export { XChaCha20Poly1305 } from './algorithms/aead/xchacha20poly1305/XChaCha20-Poly1305.js';

export { EncryptingReader } from './stream/EncryptingReader.js';
export { DecryptingWriter, type WriterStatus } from './stream/DecryptingWriter.js';
export {
  blockCount,
  blockIndexOf,
  blockStart,
  ciphertextSize,
  locate,
  plaintextSize,
  type BlockLocation,
} from './stream/positions.js';
export { blockNonce, MAX_COUNTER } from './stream/nonce.js';

export { generateKey } from './keys/generateKey.js';

export { MemoryStream } from './util/MemoryStream.js';
export { ByteQueue } from './util/ByteQueue.js';
export { base64Encode, base64Decode } from './util/bytes.js';
export { createLogger, type Logger, type LogSink, type Verbosity } from './util/logger.js';

export {
  Whence,
  type Aead,
  type ByteSink,
  type CipherConstructor,
  type CipherName,
  type CryptoProvider,
  type SeekableSource,
  type StreamOptions,
} from './types/index.js';

export {
  SeekboxError,
  InvalidInputError,
  CapacityExceededError,
  MalformedHeaderError,
  AuthenticationError,
  IncompleteStreamError,
  StreamClosedError,
  CipherError,
  FilesystemError,
} from './errors/index.js';
