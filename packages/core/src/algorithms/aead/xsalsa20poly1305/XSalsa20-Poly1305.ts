import { xsalsa20poly1305 } from '@noble/ciphers/salsa.js';
import { BaseAEAD } from '../base/BaseAEAD.js';
import type { CipherName } from '../../../types/index.js';

/**
 * XSalsa20-Poly1305, the NaCl `crypto_secretbox` construction.
 *
 * Output is `tag(16) ‖ ciphertext`, byte-compatible with libsodium's
 * `crypto_secretbox_easy`. This is the default block cipher.
 */
export class XSalsa20Poly1305 extends BaseAEAD {
  public static readonly id: CipherName = 'xsalsa20poly1305';
  public static readonly KEY_LENGTH: number = 32;
  public static readonly NONCE_LENGTH: number = 24;
  public static readonly TAG_LENGTH: number = 16;

  public readonly KEY_LENGTH   = XSalsa20Poly1305.KEY_LENGTH;
  public readonly NONCE_LENGTH = XSalsa20Poly1305.NONCE_LENGTH;
  public readonly TAG_LENGTH   = XSalsa20Poly1305.TAG_LENGTH;

  constructor(key: Uint8Array) { super(key, XSalsa20Poly1305.KEY_LENGTH); }

  protected sealWithNonce(key: Uint8Array, nonce: Uint8Array, plain: Uint8Array): Uint8Array {
    return xsalsa20poly1305(key, nonce).encrypt(plain);
  }

  protected openWithNonce(key: Uint8Array, nonce: Uint8Array, cipher: Uint8Array): Uint8Array {
    return xsalsa20poly1305(key, nonce).decrypt(cipher);
  }
}
