// packages/kv-store/src/types.ts
import type { JsonValue, Logger } from '@chankv/utils';

export type SnapshotSchemaVersion = 1;

/** On-disk image of the whole mapping, rewritten on every mutation. */
export type SnapshotFile = {
  schemaVersion: SnapshotSchemaVersion;
  updatedAt: string; // ISO
  data: Record<string, unknown>;
};

export type LoadResult<V> = { found: true; value: V } | { found: false; value: undefined };

/** Visitor for `range`; returning `false` stops the walk. */
export type RangeVisitor<V> = (key: string, value: V) => boolean | void;

/** Maps a stored value to and from its JSON form inside the snapshot file. */
export interface ValueCodec<V> {
  encode(value: V): unknown;
  decode(raw: JsonValue, key: string): V;
}

export type ConcurrentStoreOptions<V> = {
  /** Snapshot path; omit for a memory-only store. */
  filename?: string | null;
  codec?: ValueCodec<V>;
  logger?: Logger;
};

/**
 * Typed key-value store, safe to share between concurrent async callers.
 * Mutations resolve once the snapshot (if any) reflects them.
 */
export interface KvStore<V> {
  load(key: string): LoadResult<V>;
  store(key: string, value: V): Promise<void>;
  delete(key: string): Promise<void>;
  range(visit: RangeVisitor<V>): void;
}
