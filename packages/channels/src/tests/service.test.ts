import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { hash, type LogFields, type Logger } from '@chankv/utils';
import { ConcurrentStore } from '@chankv/kv-store';

import { ChannelService } from '../service.js';
import { channelMetaCodec } from '../codec.js';
import { createOperationContext } from '../context.js';
import {
  ChannelNotFoundError,
  ChannelValidationError,
  InvalidChannelIdError,
  PreconditionFailedError,
} from '../errors.js';
import type { ChannelMeta } from '../types.js';
import { sampleChannel } from './fixtures.js';

type Line = { level: string; msg: string; fields?: LogFields };

function captureLogger(lines: Line[]): Logger {
  return {
    scope: 'test',
    debug: (msg, fields) => lines.push({ level: 'debug', msg, fields }),
    info: (msg, fields) => lines.push({ level: 'info', msg, fields }),
    warn: (msg, fields) => lines.push({ level: 'warn', msg, fields }),
    error: (msg, fields) => lines.push({ level: 'error', msg, fields }),
    child: () => captureLogger(lines),
  };
}

/** Clock advancing one second per call from 2024-01-01T00:00:00Z. */
function steppingClock(): () => Date {
  let t = Date.parse('2024-01-01T00:00:00.000Z');
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

async function setup(filename: string | null = null) {
  const lines: Line[] = [];
  const logger = captureLogger(lines);
  const store = await ConcurrentStore.open<ChannelMeta>({ filename, codec: channelMetaCodec, logger });
  const svc = new ChannelService({ store, logger, now: steppingClock() });
  return { svc, store, lines };
}

const ctx = createOperationContext('00-0123456789abcdef0123456789abcdef-0123456789abcdef-00');

test('put creates, get returns it with etag = hash(channel)', async () => {
  const { svc } = await setup();
  const body = sampleChannel();

  const res = await svc.put(ctx, 'test', body);
  assert.equal(res.status, 'created');
  assert.equal(res.etag, hash(body));
  assert.equal(res.lastModified.toISOString(), '2024-01-01T00:00:00.000Z');

  const meta = await svc.get(ctx, 'test');
  assert.equal(meta.id, 'test');
  assert.equal(meta.etag, res.etag);
  assert.deepEqual(meta.channel, body);
});

test('put with an identical body is not-modified and writes nothing', async () => {
  const { svc } = await setup();
  const first = await svc.put(ctx, 'test', sampleChannel());

  // same content, different key order
  const reordered = JSON.parse(JSON.stringify(sampleChannel()));
  const again = await svc.put(ctx, 'test', { videoEncoders: reordered.videoEncoders, ...reordered });

  assert.deepEqual(again, { status: 'not-modified', etag: first.etag, lastModified: first.lastModified });
  assert.equal((await svc.get(ctx, 'test')).lastModified.getTime(), first.lastModified.getTime());
});

test('on: false and empty tags count as the same body as their absence', async () => {
  const { svc } = await setup();
  const { on: _on, ...off } = sampleChannel();
  const first = await svc.put(ctx, 'ch1', off);
  const again = await svc.put(ctx, 'ch1', { ...off, on: false, tags: [] });
  assert.equal(again.status, 'not-modified');
  assert.equal(again.etag, first.etag);
});

test('get and list hand out copies of the stored record', async () => {
  const { svc } = await setup();
  const put = await svc.put(ctx, 'ch1', sampleChannel());

  const got = await svc.get(ctx, 'ch1');
  got.channel.name = 'changed';
  const [listed] = await svc.list(ctx);
  listed.channel.name = 'changed too';

  const again = await svc.get(ctx, 'ch1');
  assert.equal(again.channel.name, 'test channel');
  assert.equal(hash(again.channel), put.etag);
});

test('put with a changed body updates etag and lastModified', async () => {
  const { svc } = await setup();
  const first = await svc.put(ctx, 'test', sampleChannel());
  const second = await svc.put(ctx, 'test', sampleChannel({ name: 'renamed' }), { ifMatch: [first.etag] });

  assert.equal(second.status, 'updated');
  assert.notEqual(second.etag, first.etag);
  assert.equal(second.etag, hash(sampleChannel({ name: 'renamed' })));
  assert.equal(second.lastModified.toISOString(), '2024-01-01T00:00:01.000Z');
});

test('conditional put: stale If-Match is rejected with 412', async () => {
  const { svc } = await setup();
  const first = await svc.put(ctx, 'test', sampleChannel());

  await assert.rejects(svc.put(ctx, 'test', sampleChannel({ name: 'x' }), { ifMatch: ['stale'] }), (e: unknown) => {
    assert.ok(e instanceof PreconditionFailedError);
    assert.equal(e.status, 412);
    assert.equal(e.details[0].message, `If-Match: stale but found resource with ETag ${first.etag}`);
    return true;
  });
  assert.equal((await svc.get(ctx, 'test')).channel.name, 'test channel');
});

test('conditional put: If-None-Match * creates only once', async () => {
  const { svc } = await setup();
  const created = await svc.put(ctx, 'fresh', sampleChannel(), { ifNoneMatch: ['*'] });
  assert.equal(created.status, 'created');

  await assert.rejects(
    svc.put(ctx, 'fresh', sampleChannel({ name: 'other' }), { ifNoneMatch: ['*'] }),
    PreconditionFailedError,
  );
});

test('conditional put: If-Unmodified-Since before the last change is rejected', async () => {
  const { svc } = await setup();
  await svc.put(ctx, 'test', sampleChannel()); // modified at 00:00:00

  await svc.put(ctx, 'test', sampleChannel({ name: 'b' }), {
    ifUnmodifiedSince: new Date('2024-01-01T00:00:00.000Z'),
  });
  await assert.rejects(
    svc.put(ctx, 'test', sampleChannel({ name: 'c' }), {
      ifUnmodifiedSince: new Date('2024-01-01T00:00:00.000Z'),
    }),
    /If-Unmodified-Since/,
  );
});

test('put validates id and body before touching the store', async () => {
  const { svc, store } = await setup();
  await assert.rejects(svc.put(ctx, '!', sampleChannel()), InvalidChannelIdError);
  await assert.rejects(svc.put(ctx, 'ok-id', { name: 'x' }), ChannelValidationError);
  assert.equal(store.size, 0);
});

test('get on a missing channel is a 404', async () => {
  const { svc } = await setup();
  await assert.rejects(svc.get(ctx, 'missing'), (e: unknown) => {
    assert.ok(e instanceof ChannelNotFoundError);
    assert.equal(e.status, 404);
    assert.equal(e.channelId, 'missing');
    return true;
  });
});

test('list returns newest first', async () => {
  const { svc } = await setup();
  await svc.put(ctx, 'first', sampleChannel({ name: '1' }));
  await svc.put(ctx, 'second', sampleChannel({ name: '2' }));
  await svc.put(ctx, 'third', sampleChannel({ name: '3' }));
  await svc.put(ctx, 'first', sampleChannel({ name: '1b' }));

  const ids = (await svc.list(ctx)).map((m) => m.id);
  assert.deepEqual(ids, ['first', 'third', 'second']);
});

test('delete is idempotent', async () => {
  const { svc } = await setup();
  await svc.put(ctx, 'test', sampleChannel());
  await svc.delete(ctx, 'test');
  await svc.delete(ctx, 'test');
  await assert.rejects(svc.get(ctx, 'test'), ChannelNotFoundError);
  assert.deepEqual(await svc.list(ctx), []);
});

test('every operation logs its trace id', async () => {
  const { svc, lines } = await setup();
  await svc.put(ctx, 'test', sampleChannel());
  await assert.rejects(svc.get(ctx, 'nope'));
  await svc.delete(ctx, 'test');

  const requests = lines.filter((l) => l.msg === 'request');
  assert.deepEqual(
    requests.map((l) => [l.fields?.op, l.fields?.outcome, l.fields?.traceId]),
    [
      ['put', 'created', ctx.traceId],
      ['get', 'ChannelNotFoundError', ctx.traceId],
      ['delete', 'deleted', ctx.traceId],
    ],
  );
});

test('file-backed catalogue survives a restart with equal etags', async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chankv-channels-'));
  const file = path.join(dir, 'channels.json');

  const a = await setup(file);
  const put = await a.svc.put(ctx, 'test', sampleChannel());
  await a.svc.put(ctx, 'gone', sampleChannel({ name: 'gone' }));
  await a.svc.delete(ctx, 'gone');

  const b = await setup(file);
  const meta = await b.svc.get(ctx, 'test');
  assert.equal(meta.etag, put.etag);
  assert.equal(hash(meta.channel), put.etag);
  assert.ok(meta.lastModified instanceof Date);
  assert.equal(meta.lastModified.getTime(), put.lastModified.getTime());
  await assert.rejects(b.svc.get(ctx, 'gone'), ChannelNotFoundError);

  const again = await b.svc.put(ctx, 'test', sampleChannel());
  assert.equal(again.status, 'not-modified');
});
