// packages/kv-store/src/write-queue.ts

/**
 * In-process exclusive FIFO queue. Jobs run one at a time in submission
 * order; a failed job rejects its own promise without blocking the next.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  run<T>(job: () => Promise<T>): Promise<T> {
    this._pending++;
    const result = this.tail.then(job).finally(() => {
      this._pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every job submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  get pending(): number {
    return this._pending;
  }
}
