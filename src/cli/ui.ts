/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import type { GlobalConfig, Group, Note, SearchResult } from '../store/types.js';

export const icons = {
  memo: '\u{1F4DD}',      // memo/note
  search: '\u{1F50D}',    // magnifying glass
  folder: '\u{1F4C1}',    // folder
  dot: '\u{2022}',        // bullet point
};

/**
 * Success message with green checkmark
 */
export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

/**
 * Error message with red X
 */
export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

/**
 * Warning message with yellow warning sign
 */
export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

export function dim(text: string): string {
  return chalk.gray(text);
}

/**
 * Key-value pair display
 */
export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 15;
  const paddedKey = key.padEnd(width);
  return `${chalk.cyan(paddedKey)} ${value}`;
}

/**
 * Print an empty state message
 */
export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

export function formatNote(note: Note): string {
  const heading = note.title ? `${chalk.bold(note.title)}\n   ` : '';
  let output = `${icons.memo} ${heading}${chalk.white(note.text)}`;

  const details = [`group: ${note.groupId}`];
  if (note.tags.length > 0) details.push(`tags: ${note.tags.join(', ')}`);
  if (note.source) details.push(`source: ${note.source}`);
  if (note.createdAt) details.push(note.createdAt);
  output += `\n   ${chalk.gray(details.join(' | '))}`;
  output += `\n   ${chalk.dim(`ID: ${note.id}`)}`;

  return output;
}

/**
 * Note plus its score, coloured by relevance
 */
export function formatSearchResult(result: SearchResult): string {
  const percentage = Math.round(result.score * 100);

  let percentColor = chalk.red;
  if (percentage >= 80) percentColor = chalk.green;
  else if (percentage >= 60) percentColor = chalk.yellow;
  else if (percentage >= 40) percentColor = chalk.cyan;

  return `${formatNote(result.note)}\n   ${percentColor(`${percentage}% match`)}`;
}

export function formatGroup(group: Group): string {
  const description = group.description ? ` ${chalk.gray(`- ${group.description}`)}` : '';
  return `${icons.folder} ${chalk.bold(group.groupKey)} ${group.title}${description}\n   ${chalk.dim(`ID: ${group.id}`)}`;
}

export function formatGlobalConfig(config: GlobalConfig): string {
  return `${chalk.cyan(config.key)} = ${chalk.white(formatValue(config.value))} ${dim(`(updated ${config.updatedAt})`)}`;
}

export function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}
