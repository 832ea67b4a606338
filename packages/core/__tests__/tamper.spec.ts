import { BLOCK_SIZE, OUTPUT_BLOCK_SIZE } from '../src/config/defaults.js';
import { HEADER_SIZE } from '../src/header/constants.js';
import { EncryptingReader } from '../src/stream/EncryptingReader.js';
import {
  AuthenticationError,
  IncompleteStreamError,
  MalformedHeaderError,
} from '../src/errors/index.js';
import { MemoryStream } from '../src/util/MemoryStream.js';
import { nodeProvider } from '../../node-runtime/src/provider.js';
import {
  OTHER_KEY,
  KEY,
  decryptInto,
  encrypt,
  flipByte,
  makePlain,
} from './test.helpers.js';

const plain  = makePlain(3 * BLOCK_SIZE + 77);
const cipher = encrypt(plain);

function blockAt(buf: Uint8Array, i: number): Uint8Array {
  const start = HEADER_SIZE + i * OUTPUT_BLOCK_SIZE;
  return buf.subarray(start, Math.min(start + OUTPUT_BLOCK_SIZE, buf.length));
}

function assemble(header: Uint8Array, blocks: Uint8Array[]): Uint8Array {
  const total = blocks.reduce((n, b) => n + b.length, header.length);
  const out   = new Uint8Array(total);
  out.set(header);
  let o = header.length;
  for (const b of blocks) {
    out.set(b, o);
    o += b.length;
  }
  return out;
}

describe('DecryptingWriter - ciphertext integrity guard', () => {
  const POSITIONS: Array<[string, number]> = [
    ['file nonce in the header', 10],
    ['first byte of block 0', HEADER_SIZE],
    ['middle of block 1', HEADER_SIZE + OUTPUT_BLOCK_SIZE + 500_000],
    ['last byte of block 2', HEADER_SIZE + 3 * OUTPUT_BLOCK_SIZE - 1],
  ];

  it.each(POSITIONS)('flipped byte in %s ⇒ AuthenticationError, sink emptied', (_where, pos) => {
    const sink = new MemoryStream();
    expect(() => decryptInto(sink, flipByte(cipher, pos), [65_536]))
      .toThrow(AuthenticationError);
    expect(sink.length).toBe(0);
    expect(sink.tell()).toBe(0);
  });

  it('flipped byte in the partial last block ⇒ IncompleteStreamError, sink emptied', () => {
    const sink = new MemoryStream();
    expect(() => decryptInto(sink, flipByte(cipher, cipher.length - 1), [65_536]))
      .toThrow(IncompleteStreamError);
    expect(sink.length).toBe(0);
    expect(sink.tell()).toBe(0);
  });

  it('flipped version byte ⇒ MalformedHeaderError', () => {
    const sink = new MemoryStream();
    expect(() => decryptInto(sink, flipByte(cipher, 0))).toThrow(MalformedHeaderError);
    expect(sink.length).toBe(0);
  });

  it('wrong key ⇒ AuthenticationError on block 0', () => {
    const sink = new MemoryStream();
    expect(() => decryptInto(sink, cipher, undefined, {}, OTHER_KEY))
      .toThrow(/Failed to decrypt block 0/);
  });

  it('swapped blocks ⇒ failure on the first misplaced block', () => {
    const header    = cipher.subarray(0, HEADER_SIZE);
    const reordered = assemble(header, [
      blockAt(cipher, 0),
      blockAt(cipher, 2),
      blockAt(cipher, 1),
      blockAt(cipher, 3),
    ]);
    const sink = new MemoryStream();
    expect(() => decryptInto(sink, reordered)).toThrow(/Failed to decrypt block 1/);
    expect(sink.length).toBe(0);
  });

  it('duplicated block ⇒ AuthenticationError', () => {
    const header = cipher.subarray(0, HEADER_SIZE);
    const dup    = assemble(header, [blockAt(cipher, 0), blockAt(cipher, 0), blockAt(cipher, 3)]);
    expect(() => decryptInto(new MemoryStream(), dup)).toThrow(/Failed to decrypt block 1/);
  });

  it('dropped final block ⇒ stream rejected', () => {
    const header = cipher.subarray(0, HEADER_SIZE);
    const cut    = assemble(header, [blockAt(cipher, 0), blockAt(cipher, 1), blockAt(cipher, 2)]);
    const sink   = new MemoryStream();
    expect(() => decryptInto(sink, cut)).toThrow('Stream ended before its final block');
    expect(sink.length).toBe(0);
  });

  it('block spliced in from another stream ⇒ AuthenticationError', () => {
    const small = makePlain(2 * BLOCK_SIZE + 9);
    const a = new EncryptingReader(new MemoryStream(small), KEY, nodeProvider).readAll();
    const b = new EncryptingReader(new MemoryStream(small), KEY, nodeProvider).readAll();

    const spliced = assemble(a.subarray(0, HEADER_SIZE), [
      blockAt(a, 0),
      blockAt(b, 1),
      blockAt(a, 2),
    ]);
    expect(() => decryptInto(new MemoryStream(), spliced)).toThrow(/Failed to decrypt block 1/);
  });
});
