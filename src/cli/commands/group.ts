import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { nanoid } from 'nanoid';
import { formatTimestamp } from '../../store/similarity.js';
import { validateGroupKeyForCreate } from '../../store/validation.js';
import { withMemory } from '../context.js';
import { resolveProject } from '../options.js';
import { emptyState, formatGroup, success } from '../ui.js';

export const groupCommand = new Command('group')
  .description('Manage note groups');

// memvault group add <key>
groupCommand
  .command('add')
  .argument('<key>', 'Group key (letters, digits, "_" and "-")')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .option('--title <title>', 'Display title (defaults to the key)')
  .option('-d, --description <text>', 'What belongs in the group', '')
  .description('Create a group')
  .action(async (key, options) => {
    await withMemory(async ({ store }) => {
      validateGroupKeyForCreate(key);
      const now = formatTimestamp();
      await store.addGroup({
        id: nanoid(),
        projectId: resolveProject(options.project),
        groupKey: key,
        title: options.title ?? key,
        description: options.description,
        createdAt: now,
        updatedAt: now,
      });
      console.log(success(`Created group ${chalk.bold(key)}`));
    });
  });

// memvault group list
groupCommand
  .command('list')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .description('List groups, oldest first')
  .action(async (options) => {
    await withMemory(async ({ store }) => {
      const groups = await store.listGroups(resolveProject(options.project));
      if (groups.length === 0) {
        emptyState('No groups yet.', `Create one with ${chalk.cyan('memvault group add <key>')}`);
        return;
      }
      for (const group of groups) {
        console.log(formatGroup(group));
      }
    });
  });

// memvault group delete <key>
groupCommand
  .command('delete')
  .argument('<key>', 'Group key')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .description('Delete a group (its notes are kept)')
  .action(async (key, options) => {
    await withMemory(async ({ store }) => {
      const group = await store.getGroupByKey(resolveProject(options.project), key);
      await store.deleteGroup(group.id);
      console.log(success(`Deleted group ${chalk.bold(key)}`));
    });
  });
