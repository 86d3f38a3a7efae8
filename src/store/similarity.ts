import type { Logger } from '../util/logger.js';
import type { ListOptions, Note, SearchOptions, SearchResult } from './types.js';

// Filtering and ranking rules shared by every backend. The remote backend
// pushes the filters down to the server but ranks and truncates with the same
// comparators, so results line up with the local scans.

const MAX_DISTANCE = 2;

const RFC3339 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Cosine distance in [0, 2]. Vectors of different length, or with a zero
 * norm, are maximally dissimilar.
 */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    return MAX_DISTANCE;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return MAX_DISTANCE;
  }

  return clamp(1 - dotProduct / denominator, 0, MAX_DISTANCE);
}

export function scoreFromDistance(distance: number): number {
  return 1 - distance / 2;
}

// Remote services report raw cosine similarity in [-1, 1]
export function scoreFromSimilarity(similarity: number): number {
  return scoreFromDistance(clamp(1 - similarity, 0, MAX_DISTANCE));
}

export function containsAllTags(tags: readonly string[], required: readonly string[]): boolean {
  if (required.length === 0) return true;
  const present = new Set(tags);
  return required.every((tag) => present.has(tag));
}

/**
 * projectId, groupId and tag predicates (search steps 1-3; listRecent uses the
 * same ones).
 */
export function matchesScope(
  note: Pick<Note, 'projectId' | 'groupId' | 'tags'>,
  opts: Pick<ListOptions, 'projectId' | 'groupId' | 'tags'>
): boolean {
  if (note.projectId !== opts.projectId) return false;
  if (opts.groupId !== undefined && note.groupId !== opts.groupId) return false;
  return containsAllTags(note.tags, opts.tags ?? []);
}

/**
 * Half-open interval: since <= createdAt < until. A missing or unparsable
 * createdAt fails whenever either bound is set.
 */
export function inTimeRange(createdAt: string | undefined, opts: Pick<SearchOptions, 'since' | 'until'>): boolean {
  if (!opts.since && !opts.until) return true;

  const time = parseTimestamp(createdAt);
  if (time === null) return false;

  if (opts.since && time < opts.since.getTime()) return false;
  if (opts.until && time >= opts.until.getTime()) return false;
  return true;
}

export function matchesSearch(note: Note, opts: SearchOptions): boolean {
  return matchesScope(note, opts) && inTimeRange(note.createdAt, opts);
}

/** Milliseconds since epoch, or null when the value is not RFC 3339. */
export function parseTimestamp(value: string | undefined): number | null {
  if (!value || !RFC3339.test(value)) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

/** Second-precision UTC timestamp, e.g. 2024-05-01T12:00:00Z */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Score descending, then id ascending so equal scores have a stable order.
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (b.score !== a.score) return b.score - a.score;
  return compareIds(a.note.id, b.note.id);
}

export function rankResults(results: SearchResult[], topK: number): SearchResult[] {
  return results.sort(compareResults).slice(0, topK);
}

/**
 * Newest first; notes without a usable createdAt go last. Unparsable values
 * are logged and never fatal.
 */
export function sortRecent(notes: Note[], logger?: Logger): Note[] {
  const times = new Map<string, number | null>();
  for (const note of notes) {
    const time = parseTimestamp(note.createdAt);
    if (time === null && note.createdAt !== undefined) {
      logger?.warn(`unparsable createdAt on note ${note.id}: ${note.createdAt}`);
    }
    times.set(note.id, time);
  }

  return notes.sort((a, b) => {
    const ta = times.get(a.id) ?? null;
    const tb = times.get(b.id) ?? null;
    if (ta === null && tb === null) return compareIds(a.id, b.id);
    if (ta === null) return 1;
    if (tb === null) return -1;
    if (tb !== ta) return tb - ta;
    return compareIds(a.id, b.id);
  });
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
