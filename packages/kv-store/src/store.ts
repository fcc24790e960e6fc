// packages/kv-store/src/store.ts
import { createLogger, type Logger } from '@chankv/utils';

import type { ConcurrentStoreOptions, KvStore, LoadResult, RangeVisitor, ValueCodec } from './types.js';
import { InvalidKeyError, SnapshotDecodeError, SnapshotWriteError } from './errors.js';
import { jsonCodec } from './codec.js';
import { readSnapshot, writeSnapshot } from './snapshot.js';
import { WriteQueue } from './write-queue.js';

type Slot<V> = { value: V };

/**
 * Generic key-value store with optional write-through snapshot persistence.
 *
 * Memory is the source of truth and every mutation is applied synchronously,
 * so concurrent async callers always see each other's completed calls. When a
 * snapshot file is configured, each `store`/`delete` also queues a full
 * rewrite of the file and resolves once that rewrite has landed. Rewrites run
 * one at a time, each capturing the mapping as it is when the rewrite starts.
 */
export class ConcurrentStore<V> implements KvStore<V> {
  private readonly items = new Map<string, Slot<V>>();
  private readonly queue = new WriteQueue();

  private constructor(
    private readonly _filename: string | null,
    private readonly codec: ValueCodec<V>,
    private readonly log: Logger,
  ) {}

  /**
   * Create a store, loading the snapshot at `filename` when it exists.
   * Rejects with SnapshotDecodeError if an existing snapshot cannot be used.
   */
  static async open<V>(opts: ConcurrentStoreOptions<V> = {}): Promise<ConcurrentStore<V>> {
    const filename = opts.filename || null;
    const log = opts.logger ?? createLogger('kv-store');
    const store = new ConcurrentStore<V>(filename, opts.codec ?? jsonCodec<V>(), log);

    if (filename) {
      const data = await readSnapshot(filename);
      if (data === null) {
        log.debug('no snapshot, starting empty', { file: filename });
      } else {
        for (const [key, raw] of Object.entries(data)) {
          let value: V;
          try {
            value = store.codec.decode(raw, key);
          } catch (e) {
            throw new SnapshotDecodeError(filename, `cannot decode value for key "${key}"`, { cause: e });
          }
          store.items.set(key, { value });
        }
        log.debug('snapshot loaded', { file: filename, entries: store.items.size });
      }
    }

    return store;
  }

  get filename(): string | null {
    return this._filename;
  }

  get size(): number {
    return this.items.size;
  }

  load(key: string): LoadResult<V> {
    const slot = this.items.get(key);
    if (!slot) return { found: false, value: undefined };
    return { found: true, value: slot.value };
  }

  async store(key: string, value: V): Promise<void> {
    if (typeof key !== 'string' || key.length === 0) throw new InvalidKeyError(key);

    this.items.set(key, { value });
    await this.persist('store', key);
  }

  async delete(key: string): Promise<void> {
    if (!this.items.delete(key)) {
      // nothing changed; still wait for earlier rewrites so the file is current on return
      await this.flushed();
      return;
    }
    await this.persist('delete', key);
  }

  range(visit: RangeVisitor<V>): void {
    for (const [key, slot] of Array.from(this.items)) {
      if (visit(key, slot.value) === false) return;
    }
  }

  /** Shallow copy of the mapping. */
  entries(): Record<string, V> {
    return Object.fromEntries(Array.from(this.items, ([key, slot]): [string, V] => [key, slot.value]));
  }

  /** Resolves when every snapshot rewrite queued so far has settled. */
  flushed(): Promise<void> {
    return this.queue.idle();
  }

  private persist(op: 'store' | 'delete', key: string): Promise<void> {
    const filename = this._filename;
    if (!filename) return Promise.resolve();

    return this.queue.run(async () => {
      // fromEntries defines own properties, so a "__proto__" key survives
      const data: Record<string, unknown> = Object.fromEntries(
        Array.from(this.items, ([k, slot]): [string, unknown] => [k, this.codec.encode(slot.value)]),
      );

      try {
        await writeSnapshot(filename, data);
      } catch (e) {
        const err = new SnapshotWriteError(filename, e);
        this.log.error('snapshot write failed', { op, key, file: filename, error: err.message });
        throw err;
      }
      this.log.debug('snapshot written', { op, key, file: filename, entries: this.items.size });
    });
  }
}
