// packages/cli/src/program.ts
import { Command, CommanderError } from 'commander';

import { ChannelError } from '@chankv/channels';

import { registerChannelCommands, formatChannelError } from './commands/channels.js';
import { registerHashCommand } from './commands/hash.js';
import { registerTraceCommand } from './commands/trace.js';
import { makeConfigCommand } from './commands/config.js';
import { consolePrinter, type Printer } from './io.js';
import {
  openChannelRuntime,
  resolveActivePaths,
  type ChannelRuntime,
  type Env,
  type GlobalOptions,
} from './runtime.js';

export const CLI_NAME = 'chanctl';
export const CLI_VERSION = '0.1.0';

export type ProgramDeps = {
  cwd?: string;
  env?: Env;
  printer?: Printer;
};

export function makeProgram(deps: ProgramDeps = {}): Command {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const printer = deps.printer ?? consolePrinter;

  const program = new Command();
  program
    .name(CLI_NAME)
    .description('Channel catalogue on a file-backed key-value store')
    .version(CLI_VERSION)
    .option('--home <dir>', 'directory holding .chankv/ (default: CHANKV_HOME or find-up from cwd)')
    .option('--state-file <path>', 'snapshot file (overrides config)')
    .option('--log-file <path>', 'NDJSON event log (overrides config)')
    .option('--memory', 'keep channels in memory only (no snapshot file)')
    .configureOutput({
      writeOut: (s) => printer.out(s.replace(/\n$/, '')),
      writeErr: (s) => printer.err(s.replace(/\n$/, '')),
    })
    .exitOverride();

  const getActivePaths = () => resolveActivePaths({ cwd, env, opts: program.opts<GlobalOptions>() });

  // one store per invocation, opened on first use
  let runtime: Promise<ChannelRuntime> | null = null;
  const openRuntime = () => {
    if (!runtime) runtime = openChannelRuntime(getActivePaths(), env);
    return runtime;
  };

  registerChannelCommands(program, { openRuntime, printer });
  registerHashCommand(program, { printer });
  registerTraceCommand(program, { printer });
  program.addCommand(makeConfigCommand({ getActivePaths, printer }));

  return program;
}

/**
 * Run with user args (no `node chanctl` prefix) and return the exit code.
 * Failures print as `error: ...` (with the stack when DEBUG is set).
 */
export async function runCli(userArgs: string[], deps: ProgramDeps = {}): Promise<number> {
  const printer = deps.printer ?? consolePrinter;
  const program = makeProgram(deps);

  try {
    await program.parseAsync(userArgs, { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander already printed usage/help through configureOutput
      return err.exitCode;
    }
    if (err instanceof ChannelError) {
      for (const line of formatChannelError(err)) printer.err(line);
      return 1;
    }
    if (err instanceof Error) {
      printer.err(`error: ${err.message}`);
      if (deps.env?.DEBUG && err.stack) printer.err(err.stack);
      return 1;
    }
    printer.err(`error: ${String(err)}`);
    return 1;
  }
}
