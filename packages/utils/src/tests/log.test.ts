import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createLogger, isLogLevel, describeError } from '../log.js';

function tmpFile(name: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chankv-log-'));
  return path.join(dir, 'nested', name);
}

function readEvents(file: string): Record<string, unknown>[] {
  return fs
    .readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

test('createLogger: writes NDJSON events at or above level', () => {
  const logFile = tmpFile('events.ndjson');
  const log = createLogger('svc', { level: 'info', logFile, console: false });

  log.debug('hidden');
  log.info('hello', { traceId: 't-1', n: 2 });
  log.error('boom');

  const events = readEvents(logFile);
  assert.equal(events.length, 2);
  assert.equal(events[0].level, 'info');
  assert.equal(events[0].scope, 'svc');
  assert.equal(events[0].msg, 'hello');
  assert.equal(events[0].traceId, 't-1');
  assert.equal(events[0].n, 2);
  assert.equal(typeof events[0].ts, 'string');
  assert.equal(events[1].level, 'error');
});

test('createLogger: child scopes share level and file', () => {
  const logFile = tmpFile('events.ndjson');
  const log = createLogger('cli', { level: 'debug', logFile, console: false }).child('store');
  log.debug('x');

  const [event] = readEvents(logFile);
  assert.equal(event.scope, 'cli:store');
  assert.equal(event.level, 'debug');
});

test('createLogger: fields cannot override reserved keys', () => {
  const logFile = tmpFile('events.ndjson');
  createLogger('a', { logFile, console: false, level: 'info' }).warn('real', { msg: 'fake', level: 'x' });

  const [event] = readEvents(logFile);
  assert.equal(event.msg, 'real');
  assert.equal(event.level, 'warn');
});

test('isLogLevel / describeError', () => {
  assert.ok(isLogLevel('warn'));
  assert.equal(isLogLevel('loud'), false);
  assert.equal(describeError(new Error('m')), 'm');
  assert.equal(describeError(42), '42');
});
