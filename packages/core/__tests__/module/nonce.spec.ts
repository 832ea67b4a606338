import { blockNonce, MAX_COUNTER } from '../../src/stream/nonce.js';
import { CapacityExceededError } from '../../src/errors/index.js';

describe('per-block nonce', () => {
  const fileNonce = new Uint8Array(20).fill(0xaa);
  const tail = (n: Uint8Array) => Array.from(n.subarray(20));

  it('prefixes the file nonce', () => {
    const n = blockNonce(fileNonce, 0, false);
    expect(n.length).toBe(24);
    expect(Array.from(n.subarray(0, 20))).toEqual(Array.from(fileNonce));
  });

  it('encodes index + 1 little-endian, final flag in the top bit', () => {
    expect(tail(blockNonce(fileNonce, 0, false))).toEqual([1, 0, 0, 0]);
    expect(tail(blockNonce(fileNonce, 0, true))).toEqual([1, 0, 0, 0x80]);
    expect(tail(blockNonce(fileNonce, 0x1234, false))).toEqual([0x35, 0x12, 0, 0]);
    expect(tail(blockNonce(fileNonce, MAX_COUNTER - 1, false))).toEqual([0xff, 0xff, 0xff, 0x7f]);
    expect(tail(blockNonce(fileNonce, MAX_COUNTER - 1, true))).toEqual([0xff, 0xff, 0xff, 0xff]);
  });

  it('refuses block indices past the counter range', () => {
    expect(() => blockNonce(fileNonce, MAX_COUNTER, false))
      .toThrow(new CapacityExceededError('Stream too large; maximum block index surpassed (block 2147483647)'));
  });
});
