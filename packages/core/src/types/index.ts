import type { Verbosity } from '../util/logger.js';

/* ------------------------- Seek origins ------------------------------ */
export const Whence = {
  SET: 0,
  CUR: 1,
  END: 2,
} as const;
export type Whence = typeof Whence[keyof typeof Whence];

/* ------------------------- Byte stream contracts --------------------- */

/**
 * Finite, seekable plaintext input. `read(n)` returns fewer than `n` bytes
 * only at end of data.
 */
export interface SeekableSource {
  seek(offset: number, whence?: Whence): number;
  tell(): number;
  read(size: number): Uint8Array;
}

/**
 * Append-style output. `seek` and `truncate` are only used to roll back
 * unauthenticated output.
 */
export interface ByteSink {
  write(data: Uint8Array): number;
  tell(): number;
  seek(offset: number): number;
  truncate(size: number): number;
  flush(): void;
}

/* ------------------------- Randomness -------------------------------- */

/** CSPRNG supplied by the runtime package (Node or browser). */
export interface CryptoProvider {
  /** Fill `buf` in place and return it. */
  getRandomValues(buf: Uint8Array): Uint8Array;
  isNode?: boolean;
}

/* ------------------------- AEAD primitive ---------------------------- */
export interface Aead {
  readonly KEY_LENGTH: number;
  readonly NONCE_LENGTH: number;
  readonly TAG_LENGTH: number;
  /** Returns ciphertext of `plain.length + TAG_LENGTH` bytes. */
  seal(nonce: Uint8Array, plain: Uint8Array): Uint8Array;
  /** Throws AuthenticationError when the tag does not verify. */
  open(nonce: Uint8Array, cipher: Uint8Array): Uint8Array;
}

export interface CipherConstructor {
  /* static */ readonly id: CipherName;
  /* static */ readonly KEY_LENGTH: number;
  /* static */ readonly NONCE_LENGTH: number;
  /* static */ readonly TAG_LENGTH: number;
  new (key: Uint8Array): Aead;
}

export type CipherName = 'xsalsa20poly1305' | 'xchacha20poly1305';

/* ------------------------- Options ----------------------------------- */

/**
 * Options shared by EncryptingReader and DecryptingWriter.
 */
export interface StreamOptions {
  /** AEAD used for every block; both ends must agree. Defaults to xsalsa20poly1305 */
  cipher?  : CipherName;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose? : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?  : (msg: string) => void;
}
