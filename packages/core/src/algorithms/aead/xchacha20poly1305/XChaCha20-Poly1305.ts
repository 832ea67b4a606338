import { xchacha20poly1305 } from '@noble/ciphers/chacha.js';
import { BaseAEAD } from '../base/BaseAEAD.js';
import type { CipherName } from '../../../types/index.js';

/**
 * XChaCha20-Poly1305 (IETF variant) via {@link BaseAEAD}.
 *
 * ## Framing
 * - Output is `ciphertext ‖ tag(16)`; the nonce is supplied by the caller and
 *   is not embedded.
 *
 * ## Key handling
 * - `@noble/ciphers` takes the raw 32-byte key; the base class keeps a private
 *   copy and {@link BaseAEAD.zeroKey} overwrites it.
 */
export class XChaCha20Poly1305 extends BaseAEAD {
  /** Registry name. */
  public static readonly id: CipherName = 'xchacha20poly1305';

  /** Key length in bytes. */
  public static readonly KEY_LENGTH: number = 32;

  /** XChaCha20-Poly1305 nonce length in bytes. */
  public static readonly NONCE_LENGTH: number = 24;

  /** Poly1305 tag length in bytes. */
  public static readonly TAG_LENGTH: number = 16;

  public readonly KEY_LENGTH   = XChaCha20Poly1305.KEY_LENGTH;
  public readonly NONCE_LENGTH = XChaCha20Poly1305.NONCE_LENGTH;
  public readonly TAG_LENGTH   = XChaCha20Poly1305.TAG_LENGTH;

  constructor(key: Uint8Array) { super(key, XChaCha20Poly1305.KEY_LENGTH); }

  protected sealWithNonce(key: Uint8Array, nonce: Uint8Array, plain: Uint8Array): Uint8Array {
    return xchacha20poly1305(key, nonce).encrypt(plain);
  }

  protected openWithNonce(key: Uint8Array, nonce: Uint8Array, cipher: Uint8Array): Uint8Array {
    return xchacha20poly1305(key, nonce).decrypt(cipher);
  }
}
