// packages/channels/src/codec.ts
import { isJsonObject, type JsonValue } from '@chankv/utils';
import type { ValueCodec } from '@chankv/kv-store';

import type { ChannelMeta } from './types.js';
import { parseChannel } from './validate.js';

/** Snapshot form: `lastModified` as an ISO string, channel re-validated on load. */
export const channelMetaCodec: ValueCodec<ChannelMeta> = {
  encode: (meta) => ({
    id: meta.id,
    etag: meta.etag,
    lastModified: meta.lastModified.toISOString(),
    channel: meta.channel,
  }),

  decode: (raw: JsonValue, key: string): ChannelMeta => {
    if (!isJsonObject(raw)) throw new TypeError(`channel ${key}: expected object`);

    const { id, etag, lastModified, channel } = raw;
    if (typeof id !== 'string' || id !== key) throw new TypeError(`channel ${key}: id mismatch`);
    if (typeof etag !== 'string') throw new TypeError(`channel ${key}: etag must be a string`);
    if (typeof lastModified !== 'string' || Number.isNaN(Date.parse(lastModified))) {
      throw new TypeError(`channel ${key}: lastModified must be an ISO date`);
    }

    return {
      id,
      etag,
      lastModified: new Date(lastModified),
      channel: parseChannel(channel, `channels.${key}`),
    };
  },
};
