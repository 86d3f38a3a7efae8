import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { nanoid } from 'nanoid';
import { RESERVED_GROUP, validateNote } from '../../store/validation.js';
import type { NoteInput } from '../../store/types.js';
import { withMemory } from '../context.js';
import { parseTags, resolveProject } from '../options.js';
import { formatNote, icons, success } from '../ui.js';

export const addCommand = new Command('add')
  .argument('<text...>', 'Note text')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .option('-g, --group <group>', 'Group the note belongs to', RESERVED_GROUP)
  .option('--title <title>', 'Short title')
  .option('-t, --tags <tags>', 'Comma-separated tags')
  .option('-s, --source <source>', 'Where the note came from')
  .option('--id <id>', 'Note id (generated when omitted)')
  .description(`${icons.memo} Store a note`)
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('memvault add')} "API responses are snake_case" ${chalk.gray('--tags api,style')}
  ${chalk.cyan('memvault add')} "Run migrations before seeding" ${chalk.gray('-g database')}
`);

addCommand.action(async (textParts, options) => {
  await withMemory(async ({ store, embedder }) => {
    const note: NoteInput = {
      id: options.id ?? nanoid(),
      projectId: resolveProject(options.project),
      groupId: options.group,
      text: textParts.join(' '),
      tags: parseTags(options.tags) ?? [],
    };
    if (options.title) note.title = options.title;
    if (options.source) note.source = options.source;
    validateNote(note);

    const embedding = await embedder.embed(note.text);
    const stored = await store.addNote(note, embedding);
    console.log(success(`Added note ${chalk.bold(stored.id)}`));
  });
});

export const getCommand = new Command('get')
  .argument('<id>', 'Note id')
  .option('--json', 'Print the note as JSON')
  .description('Show a note')
  .action(async (id, options) => {
    await withMemory(async ({ store }) => {
      const note = await store.get(id);
      console.log(options.json ? JSON.stringify(note, null, 2) : formatNote(note));
    });
  });

export const deleteCommand = new Command('delete')
  .argument('<id>', 'Note id')
  .description('Delete a note')
  .action(async (id) => {
    await withMemory(async ({ store }) => {
      await store.delete(id);
      console.log(success(`Deleted note ${chalk.bold(id)}`));
    });
  });
