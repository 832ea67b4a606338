import { BLOCK_SIZE, OUTPUT_BLOCK_SIZE, TAG_SIZE } from '../src/config/defaults.js';
import { HEADER_SIZE } from '../src/header/constants.js';
import { EncryptingReader } from '../src/stream/EncryptingReader.js';
import { InvalidInputError, StreamClosedError } from '../src/errors/index.js';
import type { SeekableSource } from '../src/types/index.js';
import { MemoryStream } from '../src/util/MemoryStream.js';
import { nodeProvider } from '../../node-runtime/src/provider.js';
import {
  KEY,
  decrypt,
  encrypt,
  fixedProvider,
  makePlain,
  sameBytes,
} from './test.helpers.js';

const MiB = BLOCK_SIZE;

const LENGTHS = [
  1,
  MiB / 2,
  MiB - 1,
  MiB,
  MiB + 1,
  5 * MiB - 1,
  5 * MiB,
  5 * MiB + 1,
  5 * MiB + 147,
];

const CHUNKINGS: Record<string, number[]> = {
  'single write'    : [Number.MAX_SAFE_INTEGER],
  '64 KiB writes'   : [65_536],
  'unaligned writes': [999_983],
  'mixed writes'    : [1, 7, 4_096, OUTPUT_BLOCK_SIZE + 1, 333_333],
};

/** Source that never returns more than `max` bytes per read. */
function trickle(inner: MemoryStream, max: number): SeekableSource {
  return {
    seek : (o, w) => inner.seek(o, w),
    tell : () => inner.tell(),
    read : n => inner.read(Math.min(n, max)),
  };
}

describe.each(LENGTHS)('EncryptingReader ⇄ DecryptingWriter (%i bytes)', len => {
  const plain  = makePlain(len);
  const cipher = encrypt(plain);

  it('output size follows the block formula', () => {
    const full = Math.floor(len / BLOCK_SIZE);
    const rem  = len % BLOCK_SIZE;
    const want = HEADER_SIZE + full * (BLOCK_SIZE + TAG_SIZE) + (rem > 0 ? rem + TAG_SIZE : 0);

    const reader = new EncryptingReader(new MemoryStream(plain), KEY, fixedProvider);
    expect(reader.outputSize).toBe(want);
    expect(cipher.length).toBe(want);
  });

  it.each(Object.entries(CHUNKINGS))('round-trips with %s', (_name, chunks) => {
    expect(sameBytes(decrypt(cipher, chunks), plain)).toBe(true);
  });
});

describe('EncryptingReader - construction & lifecycle', () => {
  it('rejects a zero-length source', () => {
    expect(() => new EncryptingReader(new MemoryStream(), KEY, fixedProvider))
      .toThrow(InvalidInputError);
  });

  it('rejects a key of the wrong length', () => {
    expect(() => new EncryptingReader(new MemoryStream(makePlain(4)), new Uint8Array(16), fixedProvider))
      .toThrow('Key must be 32 bytes, got 16');
  });

  it('exposes header & sizes without reading', () => {
    const reader = new EncryptingReader(new MemoryStream(makePlain(10)), KEY, fixedProvider);
    expect(reader.sourceSize).toBe(10);
    expect(reader.headerSize).toBe(24);
    expect(reader.outputSize).toBe(24 + 10 + 16);
    expect(reader.tell()).toBe(0);
  });

  it('leaves the source rewound to 0', () => {
    const src = new MemoryStream(makePlain(10));
    src.seek(7);
    new EncryptingReader(src, KEY, fixedProvider);
    expect(src.tell()).toBe(0);
  });

  it('two readers with fresh nonces produce different ciphertext', () => {
    const plain = makePlain(100);
    const a = new EncryptingReader(new MemoryStream(plain), KEY, nodeProvider).readAll();
    const b = new EncryptingReader(new MemoryStream(plain), KEY, nodeProvider).readAll();
    expect(sameBytes(a, b)).toBe(false);
    expect(Array.from(decrypt(a))).toEqual(Array.from(plain));
    expect(Array.from(decrypt(b))).toEqual(Array.from(plain));
  });

  it('returns 0 / empty at end of stream', () => {
    const reader = new EncryptingReader(new MemoryStream(makePlain(3)), KEY, fixedProvider);
    reader.readAll();
    expect(reader.readInto(new Uint8Array(8))).toBe(0);
    expect(reader.read(8).length).toBe(0);
  });

  it('read() with no size reads the rest', () => {
    const reader = new EncryptingReader(new MemoryStream(makePlain(50)), KEY, fixedProvider);
    const head = reader.read(30);
    const rest = reader.read();
    expect(head.length + rest.length).toBe(reader.outputSize);
  });

  it('tolerates sources that return short reads', () => {
    const plain  = makePlain(MiB + 500);
    const reader = new EncryptingReader(trickle(new MemoryStream(plain), 1_000), KEY, fixedProvider);
    const out    = reader.readAll();
    expect(sameBytes(out, encrypt(plain))).toBe(true);
  });

  it('detects a source that shrank after construction', () => {
    const src    = new MemoryStream(makePlain(100));
    const reader = new EncryptingReader(src, KEY, fixedProvider);
    src.truncate(50);
    expect(() => reader.readAll()).toThrow('Source changed size: expected 100 bytes at 0, got 50');
  });

  it('throws StreamClosedError after close()', () => {
    const reader = new EncryptingReader(new MemoryStream(makePlain(5)), KEY, fixedProvider);
    reader.close();
    reader.close();
    expect(reader.closed).toBe(true);
    expect(() => reader.read(1)).toThrow(StreamClosedError);
    expect(() => reader.seek(0)).toThrow(StreamClosedError);
    expect(() => reader.tell()).toThrow(StreamClosedError);
  });
});

describe('cipher selection', () => {
  const plain = makePlain(MiB + 33);

  it('round-trips with xchacha20poly1305', () => {
    const cipher = encrypt(plain, { cipher: 'xchacha20poly1305' });
    expect(sameBytes(decrypt(cipher, [70_000], { cipher: 'xchacha20poly1305' }), plain)).toBe(true);
  });

  it('both ends must agree on the cipher', () => {
    const cipher = encrypt(plain, { cipher: 'xchacha20poly1305' });
    expect(() => decrypt(cipher)).toThrow(/Failed to decrypt block 0/);
  });
});
