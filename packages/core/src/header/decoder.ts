// packages/core/src/header/decoder.ts
import {
  FILE_NONCE_LENGTH,
  HEADER_SIZE,
  VERSION_MAJOR,
  VERSION_MINOR,
} from './constants.js';
import { MalformedHeaderError } from '../errors/index.js';

export interface StreamHeader {
  major     : number;
  minor     : number;
  fileNonce : Uint8Array;
  headerLen : number;
}

/**
 * Parse the leading header of `buf`. Extra bytes after the header are ignored.
 */
export function decodeHeader(buf: Uint8Array): StreamHeader {
  if (buf.length < HEADER_SIZE) {
    throw new MalformedHeaderError(
      `Header truncated: need ${HEADER_SIZE} bytes, got ${buf.length}`,
    );
  }

  const view  = new DataView(buf.buffer, buf.byteOffset, HEADER_SIZE);
  const major = view.getUint16(0, true);
  const minor = view.getUint16(2, true);

  if (major !== VERSION_MAJOR || minor !== VERSION_MINOR) {
    throw new MalformedHeaderError(
      `Unsupported stream version ${major}.${minor} (expected ${VERSION_MAJOR}.${VERSION_MINOR})`,
    );
  }

  return {
    major,
    minor,
    fileNonce : buf.slice(4, 4 + FILE_NONCE_LENGTH),
    headerLen : HEADER_SIZE,
  };
}
