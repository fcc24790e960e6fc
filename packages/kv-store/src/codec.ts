// packages/kv-store/src/codec.ts
import type { JsonValue } from '@chankv/utils';

import type { ValueCodec } from './types.js';

/**
 * Stores values as-is. The caller vouches that `V` is plain JSON data, the
 * same way a typed `JSON.parse` would.
 */
export function jsonCodec<V>(): ValueCodec<V> {
  return {
    encode: (value) => value,
    decode: (raw: JsonValue) => raw as V,
  };
}
