// packages/node-runtime/src/FileStream.ts
import {
  closeSync,
  fstatSync,
  fsyncSync,
  ftruncateSync,
  openSync,
  readSync,
  writeSync,
} from 'node:fs';
import { FilesystemError } from '../../core/src/errors/index.js';
import { Whence, type ByteSink, type SeekableSource } from '../../core/src/types/index.js';

export type FileMode = 'read' | 'write' | 'update';

const FLAGS: Record<FileMode, string> = {
  read  : 'r',
  write : 'w+',   // create or truncate
  update: 'r+',
};

/**
 * Synchronous, descriptor-backed file stream with its own cursor. Serves as
 * the plaintext source of an EncryptingReader or the sink of a
 * DecryptingWriter.
 */
export class FileStream implements SeekableSource, ByteSink {
  private pos = 0;
  private fd : number | null;

  private constructor(fd: number, readonly path: string) {
    this.fd = fd;
  }

  static open(path: string, mode: FileMode = 'read'): FileStream {
    try {
      return new FileStream(openSync(path, FLAGS[mode], 0o600), path);
    } catch (err) {
      throw new FilesystemError(
        `Cannot open ${path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  get size(): number {
    return fstatSync(this.requireFd()).size;
  }

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

  read(size: number): Uint8Array {
    const fd  = this.requireFd();
    const buf = new Uint8Array(size);
    let filled = 0;
    while (filled < size) {
      const n = readSync(fd, buf, filled, size - filled, this.pos);
      if (n === 0) break;
      filled   += n;
      this.pos += n;
    }
    return filled === size ? buf : buf.slice(0, filled);
  }

  write(data: Uint8Array): number {
    const fd = this.requireFd();
    let done = 0;
    while (done < data.length) {
      const n = writeSync(fd, data, done, data.length - done, this.pos);
      done     += n;
      this.pos += n;
    }
    return done;
  }

  truncate(size: number = this.pos): number {
    ftruncateSync(this.requireFd(), size);
    return size;
  }

  flush(): void {
    fsyncSync(this.requireFd());
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }

  private requireFd(): number {
    if (this.fd === null) throw new FilesystemError(`File already closed: ${this.path}`);
    return this.fd;
  }
}
