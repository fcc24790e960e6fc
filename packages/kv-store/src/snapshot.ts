// packages/kv-store/src/snapshot.ts
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { isJsonObject, type JsonObject } from '@chankv/utils';

import type { SnapshotFile } from './types.js';
import { SnapshotDecodeError } from './errors.js';

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Read the `data` section of a snapshot. Returns null when the file does not
 * exist; any other failure is a SnapshotDecodeError.
 */
export async function readSnapshot(filename: string): Promise<JsonObject | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filename, 'utf8');
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') return null;
    throw new SnapshotDecodeError(filename, 'read failed', { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new SnapshotDecodeError(filename, 'malformed JSON', { cause: e });
  }

  if (!isJsonObject(parsed)) {
    throw new SnapshotDecodeError(filename, 'top level is not an object');
  }
  if (parsed.schemaVersion !== 1) {
    throw new SnapshotDecodeError(filename, `unsupported schemaVersion: ${JSON.stringify(parsed.schemaVersion ?? null)}`);
  }

  const data = parsed.data;
  if (!isJsonObject(data)) {
    throw new SnapshotDecodeError(filename, '"data" is not an object');
  }
  if (Object.prototype.hasOwnProperty.call(data, '')) {
    throw new SnapshotDecodeError(filename, 'empty key in "data"');
  }
  return data;
}

/** Replace the snapshot with `data` (write `<file>.tmp`, then rename over `<file>`). */
export async function writeSnapshot(filename: string, data: Record<string, unknown>): Promise<void> {
  await fs.mkdir(path.dirname(filename), { recursive: true });

  const file: SnapshotFile = {
    schemaVersion: 1,
    updatedAt: new Date().toISOString(),
    data,
  };

  const tmp = `${filename}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(file, null, 2), 'utf8');
  await fs.rename(tmp, filename);
}
