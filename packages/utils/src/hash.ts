// packages/utils/src/hash.ts
import { sha1 } from '@noble/hashes/legacy.js';
import { utf8ToBytes } from '@noble/hashes/utils.js';

import { bytesToBase64Url } from './bytes.js';
import { canonicalJson } from './json.js';

/**
 * Content digest of a structured value: SHA-1 over its canonical JSON,
 * as unpadded base64url (27 chars, `[A-Za-z0-9_-]`).
 *
 * Key order and Map/Set iteration order do not affect the result, so two
 * values with the same contents always share a digest. Suitable as an ETag.
 */
export function hash(value: unknown): string {
  return bytesToBase64Url(sha1(utf8ToBytes(canonicalJson(value))));
}

export const DIGEST_RE = /^[A-Za-z0-9_-]{27}$/;
