import { generateKey } from '../src/keys/generateKey.js';
import { fixedProvider } from './test.helpers.js';
import { nodeProvider } from '../../node-runtime/src/provider.js';

describe('generateKey', () => {
  it('draws KEY_LENGTH bytes from the provider', () => {
    const key = generateKey(fixedProvider);
    expect(key.length).toBe(32);
    expect(Array.from(key.subarray(0, 3))).toEqual([5, 18, 31]);
  });

  it('honours the cipher choice', () => {
    expect(generateKey(nodeProvider, 'xchacha20poly1305').length).toBe(32);
  });

  it('yields distinct keys from a real CSPRNG', () => {
    const a = generateKey(nodeProvider);
    const b = generateKey(nodeProvider);
    expect(Array.from(a)).not.toEqual(Array.from(b));
  });
});
