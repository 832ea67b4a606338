// packages/core/src/stream/positions.ts
//
// Conversions between plaintext offsets and ciphertext offsets.
//
//   ciphertext: [ header | block 0 + tag | block 1 + tag | ... | last + tag ]
//
// A ciphertext position that falls exactly on a block boundary belongs to the
// *end* of the earlier block, which is why locate() subtracts one before
// dividing.
import { BLOCK_SIZE, OUTPUT_BLOCK_SIZE, TAG_SIZE } from '../config/defaults.js';
import { HEADER_SIZE } from '../header/constants.js';
import { MalformedHeaderError } from '../errors/index.js';

export interface BlockLocation {
  /** Zero-based block index */
  blockIndex    : number;
  /** Ciphertext bytes of that block already consumed, 1…OUTPUT_BLOCK_SIZE */
  offsetInBlock : number;
}

/** Index of the block holding plaintext offset `p`. */
export function blockIndexOf(p: number): number {
  return Math.floor(p / BLOCK_SIZE);
}

/** Ciphertext offset where block `i` starts. */
export function blockStart(i: number): number {
  return HEADER_SIZE + i * OUTPUT_BLOCK_SIZE;
}

/**
 * Resolve a ciphertext position past the header to its owning block.
 * @throws {RangeError} if `offset <= HEADER_SIZE`
 */
export function locate(offset: number): BlockLocation {
  if (offset <= HEADER_SIZE) {
    throw new RangeError(`Offset ${offset} lies inside the header`);
  }
  const rel        = offset - HEADER_SIZE;
  const blockIndex = Math.floor((rel - 1) / OUTPUT_BLOCK_SIZE);
  return { blockIndex, offsetInBlock: rel - blockIndex * OUTPUT_BLOCK_SIZE };
}

/** Total ciphertext length for a plaintext of `n` bytes. */
export function ciphertextSize(n: number): number {
  const fullBlocks = Math.floor(n / BLOCK_SIZE);
  const leftOver   = n - fullBlocks * BLOCK_SIZE;
  let size = HEADER_SIZE + fullBlocks * OUTPUT_BLOCK_SIZE;
  if (leftOver > 0) size += leftOver + TAG_SIZE;
  return size;
}

/**
 * Inverse of {@link ciphertextSize}.
 * @throws {MalformedHeaderError} when no non-empty plaintext encrypts to `n` bytes
 */
export function plaintextSize(n: number): number {
  const body = n - HEADER_SIZE;
  if (body < TAG_SIZE + 1) {
    throw new MalformedHeaderError(`Ciphertext of ${n} bytes is too short to hold a block`);
  }
  const fullBlocks = Math.floor(body / OUTPUT_BLOCK_SIZE);
  const tail       = body - fullBlocks * OUTPUT_BLOCK_SIZE;
  if (tail > 0 && tail <= TAG_SIZE) {
    throw new MalformedHeaderError(`Ciphertext of ${n} bytes ends in a ${tail}-byte fragment`);
  }
  return fullBlocks * BLOCK_SIZE + (tail > 0 ? tail - TAG_SIZE : 0);
}

/** Number of blocks a plaintext of `n` bytes (n ≥ 1) is split into. */
export function blockCount(n: number): number {
  return Math.ceil(n / BLOCK_SIZE);
}
