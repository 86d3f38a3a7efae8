import { canonicalizeProjectId } from '../config/paths.js';
import { JsonValueSchema } from '../store/json.js';
import { parseTimestamp } from '../store/similarity.js';
import type { JsonValue } from '../store/types.js';
import { ValidationError } from '../store/validation.js';

// Parsers for raw command-line option strings

export function resolveProject(project: string | undefined): string {
  return canonicalizeProjectId(project ?? process.cwd());
}

/** "a, b,,c" -> ["a", "b", "c"]; undefined when nothing is left. */
export function parseTags(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const tags = value.split(',').map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  return tags.length > 0 ? tags : undefined;
}

export function parseTime(name: string, value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const time = parseTimestamp(value);
  if (time === null) {
    throw new ValidationError(`${name} must be an RFC 3339 timestamp, got "${value}"`);
  }
  return new Date(time);
}

export function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/** JSON when the text parses as JSON, otherwise the text itself. */
export function parseJsonValue(raw: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  const result = JsonValueSchema.safeParse(parsed);
  return result.success ? result.data : raw;
}

export type OutputFormat = 'text' | 'json';

export function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') return value;
  throw new ValidationError(`format must be text or json, got "${value}"`);
}
