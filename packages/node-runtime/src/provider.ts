// packages/node-runtime/src/provider.ts
import { randomFillSync } from 'node:crypto';
import type { CryptoProvider } from '../../core/src/types/index.js';

/** Node's kernel-backed CSPRNG; fills synchronously, no size cap. */
export const nodeProvider: CryptoProvider = {
  getRandomValues: buf => randomFillSync(buf),
  isNode: true,
};
