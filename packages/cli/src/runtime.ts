// packages/cli/src/runtime.ts
import { createLogger, type LogLevel, type Logger } from '@chankv/utils';
import { ConcurrentStore } from '@chankv/kv-store';
import { ChannelService, channelMetaCodec, type ChannelMeta } from '@chankv/channels';

import { ensureConfigDefaults, readConfig, type ChankvConfigV1 } from './config_store.js';
import { pickPath, resolveHomePaths } from './paths.js';

/** Global flags shared by every command. */
export type GlobalOptions = {
  home?: string;
  stateFile?: string;
  logFile?: string;
  memory?: boolean;
};

export type ActivePaths = {
  root: string;
  configFile: string;
  // null for --memory
  stateFile: string | null;
  logFile: string;
  logLevel: LogLevel;
  config: ChankvConfigV1;
};

export type Env = Record<string, string | undefined>;

/** Flags > config file > defaults. */
export function resolveActivePaths(args: { cwd: string; env: Env; opts: GlobalOptions }): ActivePaths {
  const { cwd, env, opts } = args;
  const home = resolveHomePaths({ cwd, home: opts.home, envHome: env.CHANKV_HOME });
  const config = ensureConfigDefaults(readConfig({ configFile: home.configFile }));

  const stateFile = opts.memory ? null : pickPath(home.root, home.defaultStateFile, opts.stateFile, config.stateFile);
  const logFile = pickPath(home.root, home.defaultLogFile, opts.logFile, config.logFile);
  const logLevel = config.logLevel ?? (env.DEBUG ? 'debug' : 'info');

  return { root: home.root, configFile: home.configFile, stateFile, logFile, logLevel, config };
}

export type ChannelRuntime = {
  service: ChannelService;
  store: ConcurrentStore<ChannelMeta>;
  logger: Logger;
};

export async function openChannelRuntime(paths: ActivePaths, env: Env): Promise<ChannelRuntime> {
  const logger = createLogger('chanctl', {
    level: paths.logLevel,
    logFile: paths.logFile,
    console: Boolean(env.DEBUG),
  });

  const store = await ConcurrentStore.open<ChannelMeta>({
    filename: paths.stateFile,
    codec: channelMetaCodec,
    logger: logger.child('store'),
  });

  const service = new ChannelService({ store, logger: logger.child('channels') });
  return { service, store, logger };
}
