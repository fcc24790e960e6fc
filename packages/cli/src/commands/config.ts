// packages/cli/src/commands/config.ts
import { Command } from 'commander';

import { readConfig, writeConfig, ensureConfigDefaults, setConfigValue, CONFIG_KEYS } from '../config_store.js';
import type { ActivePaths } from '../runtime.js';
import type { Printer } from '../io.js';

/**
 * Build the "config" command as a standalone command, then the caller adds it to the program:
 *   program.addCommand(makeConfigCommand(...))
 */
export function makeConfigCommand(deps: { getActivePaths: () => ActivePaths; printer: Printer }): Command {
  const { printer } = deps;
  const config = new Command('config').description('Show or change .chankv/config.json');

  config
    .command('show')
    .description('Print the resolved locations and settings')
    .action(() => {
      const p = deps.getActivePaths();
      printer.out(`root:        ${p.root}`);
      printer.out(`config file: ${p.configFile}`);
      printer.out(`state file:  ${p.stateFile ?? '(memory)'}`);
      printer.out(`log file:    ${p.logFile}`);
      printer.out(`log level:   ${p.logLevel}`);
    });

  config
    .command('set')
    .description(`Set a config value (${CONFIG_KEYS.join(', ')}); an empty value clears a path`)
    .argument('<key>', 'config key')
    .argument('<value>', 'new value')
    .action((key: string, value: string) => {
      const { configFile } = deps.getActivePaths();
      const cfg0 = ensureConfigDefaults(readConfig({ configFile }));
      writeConfig({ configFile, config: setConfigValue(cfg0, key, value) });
      printer.out(`${key} updated in ${configFile}`);
    });

  return config;
}
