/**
 * Similarity search and recency listing
 *
 * - memvault search "query" → notes ranked by similarity, with a match percentage
 * - memvault list → newest notes first
 */

import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import type { ListOptions, SearchOptions } from '../../store/types.js';
import { validateListOptions, validateSearchOptions } from '../../store/validation.js';
import { withMemory } from '../context.js';
import { parseFormat, parsePositiveInt, parseTags, parseTime, resolveProject } from '../options.js';
import { emptyState, formatNote, formatSearchResult, icons } from '../ui.js';

export const searchCommand = new Command('search')
  .argument('<query...>', 'What to search for')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .option('-g, --group <group>', 'Only notes in this group')
  .option('-t, --tags <tags>', 'Only notes carrying all of these comma-separated tags')
  .option('--since <time>', 'Only notes created at or after this RFC 3339 time')
  .option('--until <time>', 'Only notes created before this RFC 3339 time')
  .option('-k, --top-k <n>', 'Maximum results to show', '10')
  .option('--format <format>', 'Output format: text or json', 'text')
  .description(`${icons.search} Search notes by similarity`)
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('memvault search')} "database migrations"
  ${chalk.cyan('memvault search')} "error handling" ${chalk.gray('--tags api -k 5')}
  ${chalk.cyan('memvault search')} "deploy" ${chalk.gray('--since 2024-01-01T00:00:00Z --format json')}
`);

searchCommand.action(async (queryParts, options) => {
  await withMemory(async ({ store, embedder }) => {
    const format = parseFormat(options.format);
    const opts: SearchOptions = {
      projectId: resolveProject(options.project),
      groupId: options.group,
      tags: parseTags(options.tags),
      since: parseTime('since', options.since),
      until: parseTime('until', options.until),
      topK: parsePositiveInt('top-k', options.topK),
    };
    validateSearchOptions(opts);

    const embedding = await embedder.embed(queryParts.join(' '));
    const results = await store.search(embedding, opts);

    if (format === 'json') {
      console.log(JSON.stringify(results, null, 2));
      return;
    }

    if (results.length === 0) {
      emptyState('No matching notes.', 'Try a broader query or fewer filters.');
      return;
    }

    console.log();
    for (const result of results) {
      console.log(formatSearchResult(result));
      console.log();
    }
  });
});

export const listCommand = new Command('list')
  .option('-p, --project <path>', 'Project directory (defaults to the current one)')
  .option('-g, --group <group>', 'Only notes in this group')
  .option('-t, --tags <tags>', 'Only notes carrying all of these comma-separated tags')
  .option('-n, --limit <n>', 'Maximum notes to show', '20')
  .option('--format <format>', 'Output format: text or json', 'text')
  .description('List the most recent notes')
  .action(async (options) => {
    await withMemory(async ({ store }) => {
      const format = parseFormat(options.format);
      const opts: ListOptions = {
        projectId: resolveProject(options.project),
        groupId: options.group,
        tags: parseTags(options.tags),
        limit: parsePositiveInt('limit', options.limit),
      };
      validateListOptions(opts);

      const notes = await store.listRecent(opts);

      if (format === 'json') {
        console.log(JSON.stringify(notes, null, 2));
        return;
      }

      if (notes.length === 0) {
        emptyState('No notes yet.', `Add one with ${chalk.cyan('memvault add "..."')}`);
        return;
      }

      console.log();
      for (const note of notes) {
        console.log(formatNote(note));
        console.log();
      }
    });
  });
