import type { Command } from 'commander';
import { CONFIG_KEYS, ConfigKeySchema } from '../config/schema.js';
import { createSettingsStore, parseConfigValue } from '../config/settings.js';
import { createFileLogger } from '../core/logger.js';
import { getConfigPath, getLogPath } from '../core/paths.js';
import { die, ok } from '../ui/output.js';
import { printTable } from '../ui/table.js';

function parseKey(key: string) {
  const parsed = ConfigKeySchema.safeParse(key);
  if (!parsed.success) die(`Unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(', ')})`);
  return parsed.data;
}

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage user settings');

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key')
    .argument('<value>', 'Config value')
    .action((key: string, value: string) => {
      const configKey = parseKey(key);
      const parsed = parseConfigValue(configKey, value);
      if (!parsed.ok) die(`Invalid value for ${configKey}: ${parsed.error}`);
      createSettingsStore(getConfigPath(), createFileLogger(getLogPath())).set(configKey, parsed.value);
      ok(`Set ${configKey} = ${parsed.value}`);
    });

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string) => {
      const configKey = parseKey(key);
      console.log(String(createSettingsStore(getConfigPath()).get(configKey)));
    });

  cmd
    .command('list')
    .description('Show all settings')
    .action(() => {
      const settings = createSettingsStore(getConfigPath()).all();
      printTable(
        ['Key', 'Value'],
        CONFIG_KEYS.map((key) => [key, String(settings[key])]),
      );
    });
}
