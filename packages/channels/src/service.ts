// packages/channels/src/service.ts
import { hash, createLogger, type Logger } from '@chankv/utils';
import type { KvStore } from '@chankv/kv-store';

import type { ChannelMeta, PutChannelResult } from './types.js';
import type { OperationContext } from './context.js';
import { ChannelError, ChannelNotFoundError, PreconditionFailedError } from './errors.js';
import { checkWriteConditions, hasConditions, type WriteConditions } from './conditional.js';
import { assertChannelId, parseChannel } from './validate.js';

export type ChannelServiceOptions = {
  store: KvStore<ChannelMeta>;
  logger?: Logger;
  now?: () => Date;
};

type Op = 'list' | 'get' | 'put' | 'delete';

/**
 * Channel catalogue on top of a KvStore. Every call takes the caller's
 * OperationContext and logs one `request` line tagged with its trace id.
 */
export class ChannelService {
  private readonly store: KvStore<ChannelMeta>;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(opts: ChannelServiceOptions) {
    this.store = opts.store;
    this.log = opts.logger ?? createLogger('channels');
    this.now = opts.now ?? (() => new Date());
  }

  /** All channels, most recently modified first. */
  async list(ctx: OperationContext): Promise<ChannelMeta[]> {
    return this.traced(ctx, 'list', undefined, async () => {
      const metas: ChannelMeta[] = [];
      this.store.range((_id, meta) => {
        metas.push(structuredClone(meta));
        return true;
      });
      // the store has no order; newest first, id as tie-break
      metas.sort((a, b) => b.lastModified.getTime() - a.lastModified.getTime() || (a.id < b.id ? -1 : 1));
      return { result: metas, outcome: `ok count=${metas.length}` };
    });
  }

  async get(ctx: OperationContext, id: string): Promise<ChannelMeta> {
    return this.traced(ctx, 'get', id, async () => {
      assertChannelId(id);
      const r = this.store.load(id);
      if (!r.found) throw new ChannelNotFoundError(id);
      // callers get their own copy; the stored record only changes through put
      return { result: structuredClone(r.value), outcome: 'ok' };
    });
  }

  /**
   * Create or replace a channel. Conditions are checked against the current
   * record first; a body identical to the stored one is reported as
   * `not-modified` and nothing is written.
   */
  async put(ctx: OperationContext, id: string, body: unknown, conditions?: WriteConditions): Promise<PutChannelResult> {
    return this.traced(ctx, 'put', id, async () => {
      assertChannelId(id);
      const channel = parseChannel(body);

      const existing = this.store.load(id);
      const etag = existing.found ? existing.value.etag : '';
      const modified = existing.found ? existing.value.lastModified : new Date(0);

      if (conditions && hasConditions(conditions)) {
        const failures = checkWriteConditions(conditions, etag, modified);
        if (failures.length) throw new PreconditionFailedError(failures);
      }

      const nextEtag = hash(channel);
      if (existing.found && nextEtag === hash(existing.value.channel)) {
        const result: PutChannelResult = { status: 'not-modified', etag, lastModified: modified };
        return { result, outcome: result.status };
      }

      const meta: ChannelMeta = { id, etag: nextEtag, lastModified: this.now(), channel };
      await this.store.store(id, meta);

      const result: PutChannelResult = {
        status: existing.found ? 'updated' : 'created',
        etag: meta.etag,
        lastModified: meta.lastModified,
      };
      return { result, outcome: result.status };
    });
  }

  /** Remove a channel; deleting an absent channel succeeds. */
  async delete(ctx: OperationContext, id: string): Promise<void> {
    return this.traced(ctx, 'delete', id, async () => {
      assertChannelId(id);
      const existed = this.store.load(id).found;
      await this.store.delete(id);
      return { result: undefined, outcome: existed ? 'deleted' : 'absent' };
    });
  }

  private async traced<T>(
    ctx: OperationContext,
    op: Op,
    id: string | undefined,
    fn: () => Promise<{ result: T; outcome: string }>,
  ): Promise<T> {
    try {
      const { result, outcome } = await fn();
      this.log.info('request', { op, id, outcome, traceId: ctx.traceId });
      return result;
    } catch (err) {
      if (err instanceof ChannelError) {
        this.log.info('request', { op, id, outcome: err.name, status: err.status, traceId: ctx.traceId });
      } else {
        this.log.error('request failed', {
          op,
          id,
          error: err instanceof Error ? err.message : String(err),
          traceId: ctx.traceId,
        });
      }
      throw err;
    }
  }
}
