// packages/cli/src/io.ts
import { promises as fs } from 'node:fs';

export type Printer = {
  out(line: string): void;
  err(line: string): void;
};

export const consolePrinter: Printer = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Parse a JSON argument or the contents of `file` (one of them is required). */
export async function readJsonInput(args: { inline?: string; file?: string; what: string }): Promise<unknown> {
  const { inline, file, what } = args;
  if (inline !== undefined && file !== undefined) throw new Error(`${what}: pass either inline JSON or --file, not both`);

  let raw: string;
  let source: string;
  if (file !== undefined) {
    raw = await fs.readFile(file, 'utf8');
    source = file;
  } else if (inline !== undefined) {
    raw = inline;
    source = 'argument';
  } else {
    throw new Error(`${what}: missing JSON (pass it inline or with --file)`);
  }

  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new Error(`${what}: invalid JSON in ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function parseDateOption(raw: string, flag: string): Date {
  const d = new Date(raw);
  if (Number.isNaN(d.getTime())) throw new Error(`invalid ${flag} "${raw}" (expected ISO-8601 or HTTP date)`);
  return d;
}

export function parsePositiveInt(raw: string, flag: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new Error(`invalid ${flag} "${raw}" (expected a positive integer)`);
  return n;
}
