// packages/cli/src/commands/channels.ts
import type { Command } from 'commander';

import {
  ChannelError,
  createOperationContext,
  parseEtagList,
  type ChannelMeta,
  type WriteConditions,
} from '@chankv/channels';

import type { ChannelRuntime } from '../runtime.js';
import { parseDateOption, readJsonInput, type Printer } from '../io.js';

export type ChannelCommandDeps = {
  openRuntime: () => Promise<ChannelRuntime>;
  printer: Printer;
};

type PutOptions = {
  file?: string;
  ifMatch?: string[];
  ifNoneMatch?: string[];
  ifModifiedSince?: string;
  ifUnmodifiedSince?: string;
};

function toJson(meta: ChannelMeta) {
  return {
    id: meta.id,
    etag: meta.etag,
    lastModified: meta.lastModified.toISOString(),
    channel: meta.channel,
  };
}

function conditionsFrom(opts: PutOptions): WriteConditions {
  const c: WriteConditions = {};
  if (opts.ifMatch?.length) c.ifMatch = parseEtagList(opts.ifMatch);
  if (opts.ifNoneMatch?.length) c.ifNoneMatch = parseEtagList(opts.ifNoneMatch);
  if (opts.ifModifiedSince) c.ifModifiedSince = parseDateOption(opts.ifModifiedSince, '--if-modified-since');
  if (opts.ifUnmodifiedSince) c.ifUnmodifiedSince = parseDateOption(opts.ifUnmodifiedSince, '--if-unmodified-since');
  return c;
}

/** Render a domain error with its per-field details (status stays machine-readable). */
export function formatChannelError(err: ChannelError): string[] {
  const lines = [`error (${err.status}): ${err.message}`];
  for (const d of err.details) lines.push(`  ${d.location}: ${d.message}`);
  return lines;
}

export function registerChannelCommands(program: Command, deps: ChannelCommandDeps): Command {
  const { printer } = deps;
  const channels = program.command('channels').description('Manage the channel catalogue');

  // each command gets its own trace id, echoed on stderr
  const begin = () => {
    const ctx = createOperationContext();
    printer.err(`trace: ${ctx.traceId}`);
    return ctx;
  };

  // chanctl channels list
  channels
    .command('list')
    .description('List channels, most recently modified first')
    .option('--json', 'print JSON instead of a table')
    .action(async (opts: { json?: boolean }) => {
      const { service } = await deps.openRuntime();
      const metas = await service.list(begin());

      if (opts.json) {
        printer.out(JSON.stringify(metas.map(toJson), null, 2));
        return;
      }
      if (metas.length === 0) {
        printer.out('(no channels)');
        return;
      }
      for (const m of metas) {
        printer.out(`${m.id}  ${m.etag}  ${m.lastModified.toISOString()}  ${m.channel.name}`);
      }
    });

  // chanctl channels get <id>
  channels
    .command('get')
    .description('Print one channel with its etag and last-modified time')
    .argument('<id>', 'channel id')
    .action(async (id: string) => {
      const { service } = await deps.openRuntime();
      const meta = await service.get(begin(), id);
      printer.out(JSON.stringify(toJson(meta), null, 2));
    });

  // chanctl channels put <id> --file channel.json [--if-match <etag...>]
  channels
    .command('put')
    .description('Create or replace a channel (conditional when --if-* flags are given)')
    .argument('<id>', 'channel id')
    .argument('[json]', 'channel body as inline JSON')
    .option('-f, --file <path>', 'read the channel body from a JSON file')
    .option('--if-match <etag...>', 'only write if the current etag is one of these (* = exists)')
    .option('--if-none-match <etag...>', 'only write if the current etag is none of these (* = absent)')
    .option('--if-modified-since <date>', 'only write if modified after this date')
    .option('--if-unmodified-since <date>', 'only write if not modified after this date')
    .action(async (id: string, inline: string | undefined, opts: PutOptions) => {
      const body = await readJsonInput({ inline, file: opts.file, what: 'channels put' });
      const conditions = conditionsFrom(opts);

      const { service } = await deps.openRuntime();
      const res = await service.put(begin(), id, body, conditions);

      printer.out(`status:        ${res.status}`);
      printer.out(`etag:          ${res.etag}`);
      printer.out(`last-modified: ${res.lastModified.toISOString()}`);
    });

  // chanctl channels delete <id>
  channels
    .command('delete')
    .description('Delete a channel (succeeds if it does not exist)')
    .argument('<id>', 'channel id')
    .action(async (id: string) => {
      const { service } = await deps.openRuntime();
      await service.delete(begin(), id);
      printer.out(`deleted: ${id}`);
    });

  return channels;
}
