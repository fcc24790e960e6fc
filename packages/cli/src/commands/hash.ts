// packages/cli/src/commands/hash.ts
import type { Command } from 'commander';

import { hash } from '@chankv/utils';

import { readJsonInput, type Printer } from '../io.js';

export function registerHashCommand(program: Command, deps: { printer: Printer }): Command {
  return program
    .command('hash')
    .description('Print the content digest (ETag) of a JSON value')
    .argument('[json]', 'inline JSON value')
    .option('-f, --file <path>', 'read the value from a JSON file')
    .action(async (inline: string | undefined, opts: { file?: string }) => {
      const value = await readJsonInput({ inline, file: opts.file, what: 'hash' });
      deps.printer.out(hash(value));
    });
}
