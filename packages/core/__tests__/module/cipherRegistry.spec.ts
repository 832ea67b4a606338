import '../../src/config/defaults.js';
import { CipherRegistry } from '../../src/config/CipherRegistry.js';
import { XChaCha20Poly1305 } from '../../src/algorithms/aead/xchacha20poly1305/XChaCha20-Poly1305.js';
import { CipherError } from '../../src/errors/index.js';

class ShortTag extends XChaCha20Poly1305 {
  public static readonly TAG_LENGTH: number = 12;
}

describe('CipherRegistry', () => {
  it('defaults to xsalsa20poly1305', () => {
    expect(CipherRegistry.current.id).toBe('xsalsa20poly1305');
  });

  it('lists the registered ciphers', () => {
    expect(CipherRegistry.names()).toEqual(['xsalsa20poly1305', 'xchacha20poly1305']);
    expect(CipherRegistry.has('xchacha20poly1305')).toBe(true);
    expect(CipherRegistry.has('aes-256-gcm')).toBe(false);
  });

  it('throws on unknown cipher', () => {
    expect(() => CipherRegistry.get('aes-256-gcm'))
      .toThrow(new CipherError('Unknown cipher: aes-256-gcm'));
  });

  it('prevents duplicate registration', () => {
    expect(() => CipherRegistry.register(CipherRegistry.current, 16)).toThrow(CipherError);
  });

  it('refuses a cipher with a different tag size', () => {
    expect(() => CipherRegistry.register(ShortTag, 16))
      .toThrow('Cipher xchacha20poly1305 has a 12-byte tag, expected 16');
  });
});
