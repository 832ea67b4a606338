// packages/browser-runtime/src/provider.ts
import type { CryptoProvider } from '../../core/src/types/index.js';

/**
 * Randomness from the Web Crypto global (browsers, workers).
 */
export const browserProvider: CryptoProvider = {
  getRandomValues(buf) {
    buf.set(globalThis.crypto.getRandomValues(new Uint8Array(buf.length)));
    return buf;
  },
  isNode: false,
};
