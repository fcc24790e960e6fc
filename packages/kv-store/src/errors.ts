// packages/kv-store/src/errors.ts

export class KvStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KvStoreError';
  }
}

export class InvalidKeyError extends KvStoreError {
  constructor(key: unknown) {
    super(`invalid key ${JSON.stringify(key)} (expected a non-empty string)`);
    this.name = 'InvalidKeyError';
  }
}

/** Existing snapshot could not be read or decoded; the store must not start. */
export class SnapshotDecodeError extends KvStoreError {
  constructor(
    public readonly filename: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`cannot load snapshot ${filename}: ${reason}`, options);
    this.name = 'SnapshotDecodeError';
  }
}

/** Snapshot write failed after the in-memory mutation was applied. */
export class SnapshotWriteError extends KvStoreError {
  constructor(
    public readonly filename: string,
    cause: unknown,
  ) {
    super(`cannot write snapshot ${filename}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'SnapshotWriteError';
  }
}
