// packages/core/src/header/encoder.ts
import {
  FILE_NONCE_LENGTH,
  HEADER_SIZE,
  VERSION_MAJOR,
  VERSION_MINOR,
} from './constants.js';

export function encodeHeader(fileNonce: Uint8Array): Uint8Array {
  if (fileNonce.length !== FILE_NONCE_LENGTH) {
    throw new RangeError(`file nonce must be ${FILE_NONCE_LENGTH} bytes, got ${fileNonce.length}`);
  }

  const header = new Uint8Array(HEADER_SIZE);
  const view   = new DataView(header.buffer);
  view.setUint16(0, VERSION_MAJOR, true);
  view.setUint16(2, VERSION_MINOR, true);
  header.set(fileNonce, 4);
  return header;
}
