// packages/core/src/stream/nonce.ts
import { CapacityExceededError } from '../errors/index.js';
import { FILE_NONCE_LENGTH } from '../header/constants.js';

/** Largest usable counter; the top bit is the final-block flag. */
export const MAX_COUNTER = 0x7fff_ffff;
const FINAL_FLAG         = 0x8000_0000;

/**
 * `fileNonce ‖ u32le(blockIndex + 1 | final << 31)`
 * @throws {CapacityExceededError} past block index 2^31 - 2
 */
export function blockNonce(
  fileNonce : Uint8Array,
  blockIndex: number,
  isFinal   : boolean,
): Uint8Array {
  const counter = blockIndex + 1;
  if (counter > MAX_COUNTER) {
    throw new CapacityExceededError(
      `Stream too large; maximum block index surpassed (block ${blockIndex})`,
    );
  }
  const nonce = new Uint8Array(FILE_NONCE_LENGTH + 4);
  nonce.set(fileNonce, 0);
  new DataView(nonce.buffer).setUint32(
    FILE_NONCE_LENGTH,
    isFinal ? counter + FINAL_FLAG : counter,
    true,
  );
  return nonce;
}
