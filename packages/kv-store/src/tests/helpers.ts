import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { LogFields, Logger } from '@chankv/utils';

export function tmpDir(prefix = 'chankv-store-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export type Captured = { level: string; msg: string; fields?: LogFields };

/** Logger that records calls instead of printing them. */
export function captureLogger(lines: Captured[] = []): Logger & { lines: Captured[] } {
  const make = (scope: string): Logger => ({
    scope,
    debug: (msg, fields) => lines.push({ level: 'debug', msg, fields }),
    info: (msg, fields) => lines.push({ level: 'info', msg, fields }),
    warn: (msg, fields) => lines.push({ level: 'warn', msg, fields }),
    error: (msg, fields) => lines.push({ level: 'error', msg, fields }),
    child: (sub) => make(`${scope}:${sub}`),
  });
  return { ...make('test'), lines };
}
