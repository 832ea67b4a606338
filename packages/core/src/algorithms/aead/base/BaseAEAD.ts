// packages/core/src/algorithms/aead/base/BaseAEAD.ts
import { AuthenticationError, InvalidInputError } from '../../../errors/index.js';
import type { Aead } from '../../../types/index.js';

/**
 * ## BaseAEAD
 *
 * Shared plumbing for the 24-byte-nonce AEADs used by the block codec.
 *
 * Subclasses implement only the cipher-specific work
 * ({@link sealWithNonce}, {@link openWithNonce}); this class owns:
 *
 * - **key validation**: the key must be exactly {@link KEY_LENGTH} bytes and is
 *   copied on construction, so the caller may wipe its own buffer,
 * - **nonce validation**: every call must supply {@link NONCE_LENGTH} bytes,
 * - **failure mapping**: any rejection from the underlying primitive surfaces as
 *   {@link AuthenticationError}; callers never see library-specific errors.
 *
 * No associated data is bound. Position and finality are carried entirely by
 * the nonce.
 */
export abstract class BaseAEAD implements Aead {
  /** Key length in bytes. */
  public abstract readonly KEY_LENGTH: number;

  /** Nonce length in bytes. */
  public abstract readonly NONCE_LENGTH: number;

  /** Authentication tag length in bytes. */
  public abstract readonly TAG_LENGTH: number;

  /**
   * Raw key material. `null` once {@link zeroKey} ran.
   * @internal
   */
  private key: Uint8Array | null;

  constructor(key: Uint8Array, keyLength: number) {
    if (key.length !== keyLength) {
      throw new InvalidInputError(`Key must be ${keyLength} bytes, got ${key.length}`);
    }
    this.key = new Uint8Array(key); // copy
  }

  public seal(nonce: Uint8Array, plain: Uint8Array): Uint8Array {
    this.assertNonce(nonce);
    return this.sealWithNonce(this.requireKey(), nonce, plain);
  }

  /**
   * @throws {AuthenticationError} If the tag does not verify or the input is
   *   shorter than a tag.
   */
  public open(nonce: Uint8Array, cipher: Uint8Array): Uint8Array {
    this.assertNonce(nonce);
    const key = this.requireKey();
    if (cipher.length < this.TAG_LENGTH) {
      throw new AuthenticationError('Invalid ciphertext: too short.');
    }
    try {
      return this.openWithNonce(key, nonce, cipher);
    } catch {
      throw new AuthenticationError('Authentication failed: wrong key or corrupted ciphertext');
    }
  }

  /**
   * Overwrite and discard the in-memory key bytes.
   * Subsequent seal/open calls fail until a new instance is built.
   */
  public zeroKey(): void {
    if (this.key) this.key.fill(0);
    this.key = null;
  }

  /**
   * **Subclass hook:** encrypt `plain`, returning ciphertext with its tag.
   */
  protected abstract sealWithNonce(key: Uint8Array, nonce: Uint8Array, plain: Uint8Array): Uint8Array;

  /**
   * **Subclass hook:** decrypt and verify; may throw anything on failure.
   */
  protected abstract openWithNonce(key: Uint8Array, nonce: Uint8Array, cipher: Uint8Array): Uint8Array;

  private assertNonce(nonce: Uint8Array): void {
    if (nonce.length !== this.NONCE_LENGTH) {
      throw new RangeError(`Nonce must be ${this.NONCE_LENGTH} bytes, got ${nonce.length}`);
    }
  }

  private requireKey(): Uint8Array {
    if (!this.key) throw new Error('Encryption key not set');
    return this.key;
  }
}
