// packages/kv-store/src/index.ts
//
// Public exports for @chankv/kv-store.

export { ConcurrentStore } from './store.js';
export { jsonCodec } from './codec.js';
export { readSnapshot, writeSnapshot } from './snapshot.js';
export { WriteQueue } from './write-queue.js';

export {
  KvStoreError,
  InvalidKeyError,
  SnapshotDecodeError,
  SnapshotWriteError,
} from './errors.js';

export type {
  KvStore,
  LoadResult,
  RangeVisitor,
  ValueCodec,
  ConcurrentStoreOptions,
  SnapshotFile,
  SnapshotSchemaVersion,
} from './types.js';
