// packages/browser-runtime/src/index.ts
import {
  DecryptingWriter,
  EncryptingReader,
  generateKey as generateKeyWith,
  type ByteSink,
  type CipherName,
  type SeekableSource,
  type StreamOptions,
} from '../../core/src/index.js';
import { browserProvider } from './provider.js';

export function createEncryptingReader(
  source: SeekableSource,
  key: Uint8Array,
  cfg?: StreamOptions,
): EncryptingReader {
  return new EncryptingReader(source, key, browserProvider, cfg);
}

export function createDecryptingWriter(
  sink: ByteSink,
  key: Uint8Array,
  cfg?: StreamOptions,
): DecryptingWriter {
  return new DecryptingWriter(sink, key, cfg);
}

export function generateKey(cipher?: CipherName): Uint8Array {
  return generateKeyWith(browserProvider, cipher);
}

export {
  DecryptingWriter,
  EncryptingReader,
  MemoryStream,
  type ByteSink,
  type CipherName,
  type SeekableSource,
  type StreamOptions,
} from '../../core/src/index.js';
export { browserProvider } from './provider.js';
