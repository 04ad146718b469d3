import crypto from 'node:crypto';

// Cache keys and content fingerprints
export const md5Hex = (input: string | Uint8Array): string =>
  crypto.createHash('md5').update(input).digest('hex');
