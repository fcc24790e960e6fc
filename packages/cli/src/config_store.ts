// packages/cli/src/config_store.ts
import fs from 'node:fs';
import path from 'node:path';

import { isJsonObject, isLogLevel, type LogLevel } from '@chankv/utils';

export type ChankvConfigV1 = {
  version: 1;
  createdAt: string;
  // relative paths resolve against the directory holding `.chankv/`
  stateFile?: string;
  logFile?: string;
  logLevel?: LogLevel;
};

export const CONFIG_KEYS = ['stateFile', 'logFile', 'logLevel'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

function ensureParentDir(filename: string) {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
}

export function isConfigKey(x: string): x is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(x);
}

/** Keep known, well-typed keys; drop everything else. */
export function ensureConfigDefaults(partial?: unknown): ChankvConfigV1 {
  const now = new Date().toISOString();
  const p = isJsonObject(partial) ? partial : {};

  const cfg: ChankvConfigV1 = {
    version: 1,
    createdAt: typeof p.createdAt === 'string' && p.createdAt ? p.createdAt : now,
  };
  if (typeof p.stateFile === 'string' && p.stateFile) cfg.stateFile = p.stateFile;
  if (typeof p.logFile === 'string' && p.logFile) cfg.logFile = p.logFile;
  if (typeof p.logLevel === 'string' && isLogLevel(p.logLevel)) cfg.logLevel = p.logLevel;
  return cfg;
}

export function readConfig(args: { configFile: string }): ChankvConfigV1 | null {
  const { configFile } = args;
  if (!fs.existsSync(configFile)) return null;

  const raw = fs.readFileSync(configFile, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`invalid config ${configFile}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return ensureConfigDefaults(parsed);
}

export function writeConfig(args: { configFile: string; config: ChankvConfigV1 }): void {
  const { configFile, config } = args;
  ensureParentDir(configFile);
  const normalized = ensureConfigDefaults(config);
  fs.writeFileSync(configFile, JSON.stringify(normalized, null, 2) + '\n', 'utf8');
}

export function setConfigValue(config: ChankvConfigV1, key: string, value: string): ChankvConfigV1 {
  if (!isConfigKey(key)) {
    throw new Error(`unknown config key "${key}" (expected: ${CONFIG_KEYS.join('|')})`);
  }

  const v = value.trim();
  const next: ChankvConfigV1 = { ...config };

  if (key === 'logLevel') {
    if (!isLogLevel(v)) throw new Error(`invalid logLevel "${value}" (expected: debug|info|warn|error|silent)`);
    next.logLevel = v;
    return next;
  }

  if (!v) {
    delete next[key];
    return next;
  }
  next[key] = v;
  return next;
}
