import type { Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_KEYS,
  type CliConfig,
  isConfigKey,
  loadConfig,
  readConfigFile,
  setConfigValue,
} from '../config.js';

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Manage default store locations and file names')
    .addHelpText('after', `
KEYS
  ${CONFIG_KEYS.join(', ')}

EXAMPLES
  envsync config set secretsStore ./secrets.json
  envsync config set toleranceSeconds 120
  envsync config get envFile
  envsync config list`);

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .action((key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(chalk.red(`Unknown key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`));
        process.exitCode = 1;
        return;
      }
      try {
        setConfigValue(key, value);
      } catch (err) {
        reportError(err);
        return;
      }
      console.log(chalk.green(`Set ${chalk.bold(key)}`));
    });

  config
    .command('get')
    .description('Print the effective value of a configuration key')
    .argument('<key>', 'Configuration key to read')
    .action((key: string) => {
      if (!isConfigKey(key)) {
        console.error(chalk.red(`Unknown key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`));
        process.exitCode = 1;
        return;
      }
      try {
        console.log(String(loadConfig()[key]));
      } catch (err) {
        reportError(err);
      }
    });

  config
    .command('list')
    .description('List every configuration value and where it comes from')
    .action(() => {
      let effective: CliConfig;
      let stored: Partial<CliConfig>;
      try {
        effective = loadConfig();
        stored = readConfigFile();
      } catch (err) {
        reportError(err);
        return;
      }
      for (const key of CONFIG_KEYS) {
        const marker = key in stored ? '' : chalk.dim(' (default)');
        console.log(`  ${chalk.cyan(key)}: ${effective[key]}${marker}`);
      }
    });
}

function reportError(err: unknown): void {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
}
