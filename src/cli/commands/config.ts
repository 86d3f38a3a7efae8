import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
} from '../../config/index.js';
import { fail } from '../context.js';
import { formatValue, success } from '../ui.js';

export const configCommand = new Command('config')
  .description('Manage memvault configuration');

// memvault config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., embedder.provider)')
  .description('Get configuration value(s)')
  .action((key) => {
    try {
      if (key) {
        const value = getConfigValue(key);
        if (value === undefined) {
          fail(new Error(`Unknown config key: ${key}`));
          return;
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(), null, 2));
      }
    } catch (error) {
      fail(error);
    }
  });

// memvault config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., store.type)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key, value) => {
    try {
      setConfigValue(key, value);
      console.log(success(`Set ${key} = ${value}`));
    } catch (error) {
      fail(error);
    }
  });

// memvault config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    try {
      printConfigTree(loadConfig(), '');
    } catch (error) {
      fail(error);
    }
  });

function printConfigTree(obj: Record<string, unknown>, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (isRecord(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
