import { describe, it, expect, vi } from 'vitest';
import {
  containsAllTags,
  cosineDistance,
  formatTimestamp,
  inTimeRange,
  matchesScope,
  parseTimestamp,
  rankResults,
  scoreFromDistance,
  scoreFromSimilarity,
  sortRecent,
} from '../../src/store/similarity.js';
import type { Note, SearchResult } from '../../src/store/types.js';
import type { Logger } from '../../src/util/logger.js';

function note(id: string, createdAt?: string): Note {
  const n: Note = { id, projectId: 'p', groupId: 'global', text: id, tags: [] };
  if (createdAt !== undefined) n.createdAt = createdAt;
  return n;
}

describe('cosineDistance', () => {
  it('is 0 for identical directions and 2 for opposite ones', () => {
    expect(cosineDistance([1, 2, 3], [2, 4, 6])).toBeCloseTo(0, 10);
    expect(cosineDistance([1, 0], [-1, 0])).toBeCloseTo(2, 10);
    expect(cosineDistance([1, 0], [0, 1])).toBeCloseTo(1, 10);
  });

  it('treats mismatched lengths and zero vectors as maximally distant', () => {
    expect(cosineDistance([1, 0, 0], [1, 0])).toBe(2);
    expect(cosineDistance([0, 0], [1, 0])).toBe(2);
    expect(cosineDistance([], [])).toBe(2);
  });

  it('works on Float32Array input', () => {
    expect(cosineDistance(Float32Array.from([1, 1]), Float32Array.from([1, 1]))).toBeCloseTo(0, 6);
  });
});

describe('scores', () => {
  it('maps distance [0, 2] onto score [1, 0]', () => {
    expect(scoreFromDistance(0)).toBe(1);
    expect(scoreFromDistance(1)).toBe(0.5);
    expect(scoreFromDistance(2)).toBe(0);
  });

  it('maps raw similarity [-1, 1] onto the same scale', () => {
    expect(scoreFromSimilarity(1)).toBe(1);
    expect(scoreFromSimilarity(0)).toBe(0.5);
    expect(scoreFromSimilarity(-1)).toBe(0);
    expect(scoreFromSimilarity(1.0000001)).toBe(1);
  });
});

describe('filters', () => {
  it('requires every tag', () => {
    expect(containsAllTags(['a', 'b', 'c'], ['a', 'c'])).toBe(true);
    expect(containsAllTags(['a'], ['a', 'b'])).toBe(false);
    expect(containsAllTags(['a'], [])).toBe(true);
    expect(containsAllTags(['a'], ['A'])).toBe(false);
  });

  it('matches project, group and tags together', () => {
    const n = { projectId: 'p', groupId: 'g', tags: ['x'] };
    expect(matchesScope(n, { projectId: 'p' })).toBe(true);
    expect(matchesScope(n, { projectId: 'q' })).toBe(false);
    expect(matchesScope(n, { projectId: 'p', groupId: 'h' })).toBe(false);
    expect(matchesScope(n, { projectId: 'p', groupId: 'g', tags: ['x'] })).toBe(true);
  });

  it('applies since inclusively and until exclusively', () => {
    const since = new Date('2024-01-01T00:00:00Z');
    const until = new Date('2024-01-02T00:00:00Z');

    expect(inTimeRange('2024-01-01T00:00:00Z', { since, until })).toBe(true);
    expect(inTimeRange('2024-01-02T00:00:00Z', { since, until })).toBe(false);
    expect(inTimeRange('2023-12-31T23:59:59Z', { since })).toBe(false);
    expect(inTimeRange('2024-01-01T12:00:00+02:00', { since, until })).toBe(true);
  });

  it('fails a bounded range when createdAt is missing or invalid', () => {
    const since = new Date('2024-01-01T00:00:00Z');
    expect(inTimeRange(undefined, { since })).toBe(false);
    expect(inTimeRange('2024-01-05', { since })).toBe(false);
    expect(inTimeRange(undefined, {})).toBe(true);
  });
});

describe('timestamps', () => {
  it('parses RFC 3339 only', () => {
    expect(parseTimestamp('2024-01-01T00:00:00Z')).toBe(Date.UTC(2024, 0, 1));
    expect(parseTimestamp('2024-01-01T00:00:00.250Z')).toBe(Date.UTC(2024, 0, 1, 0, 0, 0, 250));
    expect(parseTimestamp('2024-01-01T02:00:00+02:00')).toBe(Date.UTC(2024, 0, 1));
    expect(parseTimestamp('2024-01-01')).toBeNull();
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
  });

  it('formats at second precision in UTC', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 4, 1, 12, 30, 15, 999)))).toBe('2024-05-01T12:30:15Z');
  });
});

describe('ordering', () => {
  it('ranks by score, then id, and truncates', () => {
    const results: SearchResult[] = [
      { note: note('c'), score: 0.5 },
      { note: note('b'), score: 0.9 },
      { note: note('a'), score: 0.5 },
      { note: note('d'), score: 0.1 },
    ];
    expect(rankResults(results, 3).map((r) => r.note.id)).toEqual(['b', 'a', 'c']);
  });

  it('sorts newest first, undated last, ties by id', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const sorted = sortRecent(
      [
        note('z-none'),
        note('old', '2024-01-01T00:00:00Z'),
        note('bad', 'garbage'),
        note('new-b', '2024-02-01T00:00:00Z'),
        note('new-a', '2024-02-01T00:00:00Z'),
      ],
      logger
    );

    expect(sorted.map((n) => n.id)).toEqual(['new-a', 'new-b', 'old', 'bad', 'z-none']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('unparsable createdAt on note bad: garbage');
  });
});
