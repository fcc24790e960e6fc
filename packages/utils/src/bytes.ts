// packages/utils/src/bytes.ts
import { bytesToHex as _bytesToHex } from '@noble/hashes/utils.js';

/** Lowercase hex, two characters per byte. */
export function bytesToHex(bytes: Uint8Array): string {
  return _bytesToHex(bytes);
}

/** URL-safe base64 without padding (RFC 4648 §5). */
export function bytesToBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}
