import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ensureConfigDefaults, readConfig, writeConfig, setConfigValue } from '../config_store.js';

test('ensureConfigDefaults: keeps known keys, drops the rest', () => {
  const cfg = ensureConfigDefaults({
    createdAt: '2024-01-01T00:00:00.000Z',
    stateFile: 'data/c.json',
    logLevel: 'loud',
    other: true,
  });
  assert.deepEqual(cfg, { version: 1, createdAt: '2024-01-01T00:00:00.000Z', stateFile: 'data/c.json' });
});

test('readConfig / writeConfig round trip', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chankv-config-'));
  const configFile = path.join(dir, '.chankv', 'config.json');

  assert.equal(readConfig({ configFile }), null);

  const cfg = ensureConfigDefaults({ createdAt: '2024-01-01T00:00:00.000Z', logLevel: 'warn' });
  writeConfig({ configFile, config: cfg });
  assert.deepEqual(readConfig({ configFile }), cfg);
  assert.ok(fs.readFileSync(configFile, 'utf8').endsWith('}\n'));
});

test('readConfig: malformed JSON names the file', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chankv-config-'));
  const configFile = path.join(dir, 'config.json');
  fs.writeFileSync(configFile, '{');
  assert.throws(() => readConfig({ configFile }), /invalid config .*config\.json/);
});

test('setConfigValue: validates keys and levels, empty clears paths', () => {
  const base = ensureConfigDefaults({ createdAt: 'c', stateFile: 'a.json' });

  assert.equal(setConfigValue(base, 'logLevel', 'debug').logLevel, 'debug');
  assert.equal(setConfigValue(base, 'logFile', 'ev.ndjson').logFile, 'ev.ndjson');
  assert.equal('stateFile' in setConfigValue(base, 'stateFile', ''), false);
  assert.equal(base.stateFile, 'a.json');

  assert.throws(() => setConfigValue(base, 'colour', 'x'), /unknown config key "colour"/);
  assert.throws(() => setConfigValue(base, 'logLevel', 'loud'), /invalid logLevel/);
});
