// packages/core/src/header/constants.ts
export const VERSION_MAJOR     = 1;
export const VERSION_MINOR     = 0;
export const FILE_NONCE_LENGTH = 20;
/** u16le major + u16le minor + file nonce */
export const HEADER_SIZE       = 2 + 2 + FILE_NONCE_LENGTH;
