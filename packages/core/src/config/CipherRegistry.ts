// packages/core/src/config/CipherRegistry.ts
import type { CipherConstructor, CipherName } from '../types/index.js';
import { CipherError } from '../errors/index.js';

export class CipherRegistry {
  private static readonly byId = new Map<string, CipherConstructor>();

  static register(c: CipherConstructor, tagSize: number): void {
    // output block arithmetic assumes one tag size for every cipher
    if (c.TAG_LENGTH !== tagSize) {
      throw new CipherError(`Cipher ${c.id} has a ${c.TAG_LENGTH}-byte tag, expected ${tagSize}`);
    }
    if (this.byId.has(c.id)) throw new CipherError(`Cipher ${c.id} already registered`);
    this.byId.set(c.id, c);
  }
  static get(id: string): CipherConstructor {
    const c = this.byId.get(id);
    if (!c) throw new CipherError(`Unknown cipher: ${id}`);
    return c;
  }
  static has(id: string): id is CipherName { return this.byId.has(id); }
  static names(): CipherName[] { return [...this.byId.values()].map(c => c.id); }
  // default cipher
  static get current(): CipherConstructor { return this.get('xsalsa20poly1305'); }
}
