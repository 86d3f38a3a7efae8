import chalk from 'chalk';
import { getConfigPath } from '../../config/paths.js';
import { getDatabasePath } from '../../config/index.js';
import { withMemory } from '../context.js';
import { keyValue } from '../ui.js';

export async function statusCommand(): Promise<void> {
  await withMemory(async ({ store, embedder, config, namespace }) => {
    console.log();
    console.log(chalk.bold('memvault status'));
    console.log(keyValue('Config', getConfigPath()));
    console.log(keyValue('Namespace', namespace));
    console.log(keyValue('Backend', store.kind));
    if (store.kind === 'sqlite') {
      console.log(keyValue('Database', getDatabasePath(config)));
    } else if (store.kind === 'qdrant') {
      console.log(keyValue('Qdrant URL', config.store.url));
    }
    console.log(keyValue('Embedder', `${embedder.name} (${embedder.model})`));
    console.log(keyValue('Dimension', String(embedder.dimensions)));
    console.log();
  });
}
