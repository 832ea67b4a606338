// packages/core/src/util/MemoryStream.ts
import { Whence, type ByteSink, type SeekableSource } from '../types/index.js';

/**
 * Growable in-memory byte stream with a single cursor, usable both as the
 * plaintext source of an EncryptingReader and as the sink of a
 * DecryptingWriter.
 */
export class MemoryStream implements SeekableSource, ByteSink {
  private buf: Uint8Array;
  private size: number;
  private pos = 0;

  constructor(initial?: Uint8Array) {
    this.buf  = initial ? new Uint8Array(initial) : new Uint8Array(0);
    this.size = this.buf.length;
  }

  /** Current content length */
  get length(): number { return this.size; }

  seek(offset: number, whence: Whence = Whence.SET): number {
    const base =
      whence === Whence.SET ? 0 :
      whence === Whence.CUR ? this.pos :
      this.size;
    const target = base + offset;
    if (!Number.isSafeInteger(target) || target < 0) {
      throw new RangeError(`Invalid seek position ${target}`);
    }
    this.pos = target;
    return this.pos;
  }

  tell(): number { return this.pos; }

  /** Read up to `size` bytes; a negative size reads to the end. */
  read(size = -1): Uint8Array {
    const end = size < 0 ? this.size : Math.min(this.size, this.pos + size);
    if (end <= this.pos) return new Uint8Array(0);
    const out = this.buf.slice(this.pos, end);
    this.pos = end;
    return out;
  }

  write(data: Uint8Array): number {
    const end = this.pos + data.length;
    this.ensureCapacity(end);
    // writing past the end leaves a zero-filled gap
    if (this.pos > this.size) this.buf.fill(0, this.size, this.pos);
    this.buf.set(data, this.pos);
    this.pos = end;
    if (end > this.size) this.size = end;
    return data.length;
  }

  truncate(size: number = this.pos): number {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RangeError(`Invalid truncate size ${size}`);
    }
    if (size < this.size) {
      this.buf.fill(0, size, this.size);
      this.size = size;
    }
    return size;
  }

  flush(): void { /* nothing buffered */ }

  /** Copy of the full content, independent of the cursor */
  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.size);
  }

  private ensureCapacity(n: number): void {
    if (n <= this.buf.length) return;
    const grown = new Uint8Array(Math.max(n, this.buf.length * 2, 64));
    grown.set(this.buf.subarray(0, this.size));
    this.buf = grown;
  }
}
