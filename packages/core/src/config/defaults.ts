import { CipherRegistry } from './CipherRegistry.js';
import { XSalsa20Poly1305 } from '../algorithms/aead/xsalsa20poly1305/XSalsa20-Poly1305.js';
import { XChaCha20Poly1305 } from '../algorithms/aead/xchacha20poly1305/XChaCha20-Poly1305.js';

/** Plaintext bytes per block; every block but the last is exactly this long. */
export const BLOCK_SIZE = 2 ** 20;

/** Poly1305 tag appended to every block. */
export const TAG_SIZE = 16;

/** Ciphertext bytes per full block. */
export const OUTPUT_BLOCK_SIZE = BLOCK_SIZE + TAG_SIZE;

CipherRegistry.register(XSalsa20Poly1305, TAG_SIZE);
CipherRegistry.register(XChaCha20Poly1305, TAG_SIZE);
