// packages/core/src/util/ByteQueue.ts

/**
 * FIFO byte buffer. Bytes are appended at the tail and detached from the
 * head; storage grows on demand and is compacted on every detach, so the
 * backing buffer never exceeds the largest length the queue ever held.
 */
export class ByteQueue {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 0) {
    this.buf = new Uint8Array(initialCapacity);
  }

  get length(): number { return this.len; }

  push(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    const needed = this.len + chunk.length;
    if (needed > this.buf.length) {
      const grown = new Uint8Array(Math.max(needed, this.buf.length * 2));
      grown.set(this.buf.subarray(0, this.len));
      this.buf = grown;
    }
    this.buf.set(chunk, this.len);
    this.len = needed;
  }

  /** Detach the first `n` bytes as a fresh copy. */
  shift(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0 || n > this.len) {
      throw new RangeError(`shift(${n}) exceeds queued ${this.len} bytes`);
    }
    const out = this.buf.slice(0, n);
    this.buf.copyWithin(0, n, this.len);
    this.len -= n;
    return out;
  }

  /** Detach everything. */
  drain(): Uint8Array {
    return this.shift(this.len);
  }

  clear(): void {
    this.buf.fill(0, 0, this.len);
    this.len = 0;
  }
}
