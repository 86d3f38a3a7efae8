import { Command } from '@commander-js/extra-typings';
import { addCommand, deleteCommand, getCommand } from './commands/note.js';
import { listCommand, searchCommand } from './commands/search.js';
import { globalCommand } from './commands/global.js';
import { groupCommand } from './commands/group.js';
import { configCommand } from './commands/config.js';
import { statusCommand } from './commands/status.js';

export const program = new Command()
  .name('memvault')
  .description('Project-scoped note memory with vector search')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (defaults to ~/.memvault/config.json)');

// The global --config flag is read wherever the config path is resolved
program.hook('preAction', (thisCommand) => {
  const { config } = thisCommand.opts();
  if (config) {
    process.env.MEMVAULT_CONFIG = config;
  }
});

// Notes
program.addCommand(addCommand);
program.addCommand(getCommand);
program.addCommand(deleteCommand);

// Retrieval
program.addCommand(searchCommand);
program.addCommand(listCommand);

// Project settings and groups
program.addCommand(globalCommand);
program.addCommand(groupCommand);

// Configuration management
program.addCommand(configCommand);

// memvault status - namespace, backend and dimension
program
  .command('status')
  .description('Show the active namespace, backend and embedding dimension')
  .action(statusCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});
