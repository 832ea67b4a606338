// packages/core/src/keys/generateKey.ts
import '../config/defaults.js';
import { CipherRegistry } from '../config/CipherRegistry.js';
import type { CipherName, CryptoProvider } from '../types/index.js';

/** Fresh random key of the cipher's key length. */
export function generateKey(
  provider: CryptoProvider,
  cipher?: CipherName,
): Uint8Array {
  const Cipher = cipher ? CipherRegistry.get(cipher) : CipherRegistry.current;
  return provider.getRandomValues(new Uint8Array(Cipher.KEY_LENGTH));
}
