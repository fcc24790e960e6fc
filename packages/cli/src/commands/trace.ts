// packages/cli/src/commands/trace.ts
import type { Command } from 'commander';

import { newTraceId } from '@chankv/utils';

import { parsePositiveInt, type Printer } from '../io.js';

export function registerTraceCommand(program: Command, deps: { printer: Printer }): Command {
  return program
    .command('trace-id')
    .description('Print fresh traceparent-style trace ids')
    .option('-n, --count <n>', 'how many to print', '1')
    .action((opts: { count: string }) => {
      const n = parsePositiveInt(opts.count, '--count');
      for (let i = 0; i < n; i++) deps.printer.out(newTraceId());
    });
}
