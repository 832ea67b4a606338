import { InvalidInputError } from '../errors/index.js';

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

/** Key files and `inspect` output carry bytes as padded Base64. */
export function base64Encode(bytes: Uint8Array): string {
  let bin = '';
  for (const b of bytes) bin += String.fromCharCode(b);
  return btoa(bin);
}

export function base64Decode(text: string): Uint8Array {
  if (text.length % 4 !== 0 || !BASE64_RE.test(text)) {
    throw new InvalidInputError(`Invalid Base64 (${text.length} characters)`);
  }
  return Uint8Array.from(atob(text), c => c.charCodeAt(0));
}
