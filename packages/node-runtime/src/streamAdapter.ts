import { Readable, Writable } from 'node:stream';
import { ReadableStream, WritableStream } from 'node:stream/web';
import type { DecryptingWriter } from '../../core/src/stream/DecryptingWriter.js';
import type { EncryptingReader } from '../../core/src/stream/EncryptingReader.js';

/** Pull-based WHATWG view of an EncryptingReader, from its current position. */
export function toWebReadable(
  reader: EncryptingReader,
  chunkSize = 64 * 1024,
): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    pull(ctl) {
      const chunk = reader.read(chunkSize);
      if (chunk.length === 0) {
        ctl.close();
        return;
      }
      ctl.enqueue(chunk);
    },
    cancel() {
      reader.close();
    },
  });
}

/**
 * WHATWG sink feeding a DecryptingWriter. Closing the stream ends it (and
 * verifies completeness); aborting rolls the plaintext back.
 */
export function toWebWritable(writer: DecryptingWriter): WritableStream<Uint8Array> {
  return new WritableStream<Uint8Array>({
    write(chunk) {
      writer.write(chunk);
    },
    close() {
      writer.endStream();
    },
    abort() {
      writer.discard();
    },
  });
}

/** Cast Node streams to WHATWG streams in one place */
export function nodeToWebReadable(r: Readable): ReadableStream<Uint8Array> {
  return Readable.toWeb(r);
}
export function nodeToWebWritable(w: Writable): WritableStream<Uint8Array> {
  return Writable.toWeb(w);
}
