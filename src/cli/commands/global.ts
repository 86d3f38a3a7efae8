import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { globalConfigId } from '../../store/records.js';
import { validateGlobalKey } from '../../store/validation.js';
import { withMemory } from '../context.js';
import { parseJsonValue, resolveProject } from '../options.js';
import { emptyState, formatGlobalConfig, success } from '../ui.js';

export const globalCommand = new Command('global')
  .description('Manage project-wide settings (keys start with "global.")');

// memvault global get <key>
globalCommand
  .command('get')
  .argument('<key>', 'Setting key, e.g. global.style')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .option('--json', 'Print the stored record as JSON')
  .description('Show a setting')
  .action(async (key, options) => {
    await withMemory(async ({ store }) => {
      validateGlobalKey(key);
      const config = await store.getGlobal(resolveProject(options.project), key);
      if (!config) {
        emptyState(`No value for ${key}.`);
        return;
      }
      console.log(options.json ? JSON.stringify(config, null, 2) : formatGlobalConfig(config));
    });
  });

// memvault global set <key> <value>
globalCommand
  .command('set')
  .argument('<key>', 'Setting key, e.g. global.style')
  .argument('<value>', 'Value; parsed as JSON when possible')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .description('Create or replace a setting')
  .action(async (key, value, options) => {
    await withMemory(async ({ store }) => {
      validateGlobalKey(key);
      const config = await store.upsertGlobal({
        projectId: resolveProject(options.project),
        key,
        value: parseJsonValue(value),
      });
      console.log(success(`Set ${chalk.bold(config.key)}`));
    });
  });

// memvault global delete <key>
globalCommand
  .command('delete')
  .argument('<key>', 'Setting key, e.g. global.style')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .description('Remove a setting')
  .action(async (key, options) => {
    await withMemory(async ({ store }) => {
      validateGlobalKey(key);
      await store.deleteGlobalById(globalConfigId(resolveProject(options.project), key));
      console.log(success(`Deleted ${chalk.bold(key)}`));
    });
  });
