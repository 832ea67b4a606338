import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStream } from '../src/FileStream.js';
import {
  FilesystemError,
  Whence,
  createDecryptingWriter,
  createEncryptingReader,
  generateKey,
} from '../src/index.js';

describe('FileStream', () => {
  let dir: string;

  beforeEach(() => { dir = mkdtempSync(join(tmpdir(), 'seekbox-fs-')); });
  afterEach(() => { rmSync(dir, { recursive: true, force: true }); });

  it('reads with its own cursor', () => {
    const path = join(dir, 'in.bin');
    writeFileSync(path, Uint8Array.of(1, 2, 3, 4, 5));

    const f = FileStream.open(path, 'read');
    try {
      expect(f.size).toBe(5);
      expect(f.seek(0, Whence.END)).toBe(5);
      expect(f.seek(1)).toBe(1);
      expect(Array.from(f.read(2))).toEqual([2, 3]);
      expect(f.tell()).toBe(3);
      expect(Array.from(f.read(10))).toEqual([4, 5]);
      expect(f.read(10).length).toBe(0);
    } finally {
      f.close();
    }
  });

  it('writes, rewinds and truncates', () => {
    const path = join(dir, 'out.bin');
    const f = FileStream.open(path, 'write');
    expect(f.write(Uint8Array.of(9, 8, 7))).toBe(3);
    expect(f.tell()).toBe(3);
    f.seek(0);
    f.truncate(0);
    f.write(Uint8Array.of(6));
    f.flush();
    f.close();
    expect(Array.from(readFileSync(path))).toEqual([6]);
  });

  it('creates new files with mode 0600', () => {
    const path = join(dir, 'secret.bin');
    FileStream.open(path, 'write').close();
    expect(statSync(path).mode & 0o777).toBe(0o600);
  });

  it('wraps open failures in FilesystemError', () => {
    expect(() => FileStream.open(join(dir, 'missing.bin'), 'read')).toThrow(FilesystemError);
  });

  it('refuses I/O after close', () => {
    const f = FileStream.open(join(dir, 'x.bin'), 'write');
    f.close();
    f.close();
    expect(() => f.write(Uint8Array.of(1))).toThrow('File already closed');
  });

  it('backs an encrypt → decrypt round-trip on disk', () => {
    const plainPath  = join(dir, 'plain.bin');
    const cipherPath = join(dir, 'cipher.bin');
    const outPath    = join(dir, 'out.bin');
    const plain      = new Uint8Array(3_000_000).map((_, i) => (i * 7) & 0xff);
    writeFileSync(plainPath, plain);
    const key = generateKey();

    const src    = FileStream.open(plainPath, 'read');
    const reader = createEncryptingReader(src, key);
    writeFileSync(cipherPath, reader.readAll());
    src.close();
    expect(statSync(cipherPath).size).toBe(reader.outputSize);

    const sink   = FileStream.open(outPath, 'write');
    const writer = createDecryptingWriter(sink, key);
    writer.write(readFileSync(cipherPath));
    writer.endStream();
    sink.close();

    expect(Buffer.compare(readFileSync(outPath), Buffer.from(plain))).toBe(0);
  });
});
