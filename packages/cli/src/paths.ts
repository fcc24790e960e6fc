// packages/cli/src/paths.ts
import path from 'node:path';
import fs from 'node:fs';

export const STATE_DIRNAME = '.chankv';
export const CONFIG_FILENAME = 'config.json';
export const DEFAULT_STATE_FILENAME = 'channels.json';
export const DEFAULT_LOG_FILENAME = 'events.ndjson';

export type HomePaths = {
  root: string;
  stateDir: string;
  configFile: string;
  defaultStateFile: string;
  defaultLogFile: string;
};

/**
 * Find the nearest directory at-or-above `startCwd` containing `.chankv/config.json`.
 * If not found, fall back to `startCwd`.
 */
export function findConfigRoot(startCwd: string): string {
  let dir = path.resolve(startCwd);

  while (true) {
    const candidate = path.join(dir, STATE_DIRNAME, CONFIG_FILENAME);
    if (fs.existsSync(candidate)) return dir;

    const parent = path.dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return path.resolve(startCwd);
}

/**
 * Root used to locate `.chankv/`:
 *   1) --home
 *   2) CHANKV_HOME
 *   3) find-up from cwd
 */
export function resolveHomePaths(args: { cwd: string; home?: string | null; envHome?: string | null }): HomePaths {
  const { cwd } = args;
  const home = String(args.home ?? '').trim();
  const envHome = String(args.envHome ?? '').trim();

  const root = home ? path.resolve(cwd, home) : envHome ? path.resolve(cwd, envHome) : findConfigRoot(cwd);
  const stateDir = path.resolve(root, STATE_DIRNAME);

  return {
    root,
    stateDir,
    configFile: path.resolve(stateDir, CONFIG_FILENAME),
    defaultStateFile: path.resolve(stateDir, DEFAULT_STATE_FILENAME),
    defaultLogFile: path.resolve(stateDir, DEFAULT_LOG_FILENAME),
  };
}

/** First non-empty candidate, resolved against `root`; else `fallback`. */
export function pickPath(root: string, fallback: string, ...candidates: (string | null | undefined)[]): string {
  for (const c of candidates) {
    const v = String(c ?? '').trim();
    if (v) return path.resolve(root, v);
  }
  return fallback;
}
