// packages/utils/src/log.ts
import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFields = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LoggerOptions = {
  /** Minimum level written anywhere. Defaults to `debug` when DEBUG is set, else `info`. */
  level?: LogLevel;
  /** Append one NDJSON event per line here (e.g. `.chankv/events.ndjson`). */
  logFile?: string | null;
  /** Mirror lines to stderr. */
  console?: boolean;
};

export type Logger = {
  readonly scope: string;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(scope: string): Logger;
};

export type LogEvent = {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  scope: string;
  msg: string;
} & LogFields;

export function isLogLevel(x: string): x is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(x);
}

export function defaultLogLevel(): LogLevel {
  return process.env.DEBUG ? 'debug' : 'info';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  const parts: string[] = [];
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined) continue;
    parts.push(`${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  }
  return parts.length ? ' ' + parts.join(' ') : '';
}

function appendEvent(logFile: string, event: LogEvent): void {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  fs.appendFileSync(logFile, JSON.stringify(event) + '\n', 'utf8');
}

/**
 * Scoped logger. Console lines look like `[kv-store] snapshot written file=...`;
 * the event file gets `{ ts, level, scope, msg, ...fields }` per line.
 */
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? defaultLogLevel();
  const logFile = opts.logFile ?? null;
  const toConsole = opts.console ?? true;

  function write(lvl: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void {
    if (WEIGHTS[lvl] < WEIGHTS[level]) return;

    if (toConsole) console.error(`[${scope}] ${msg}${formatFields(fields)}`);

    if (logFile) {
      const event: LogEvent = { ...fields, ts: new Date().toISOString(), level: lvl, scope, msg };
      try {
        appendEvent(logFile, event);
      } catch (err) {
        // the event file is auxiliary; keep the operation going
        console.error(`[${scope}] event log write failed: ${describeError(err)}`);
      }
    }
  }

  return {
    scope,
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (sub) => createLogger(`${scope}:${sub}`, { level, logFile, console: toConsole }),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent', console: false });
