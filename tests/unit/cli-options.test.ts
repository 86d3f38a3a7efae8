import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  parseFormat,
  parseJsonValue,
  parsePositiveInt,
  parseTags,
  parseTime,
  resolveProject,
} from '../../src/cli/options.js';
import { ValidationError } from '../../src/store/validation.js';

describe('parseTags', () => {
  it('splits, trims and drops empty entries', () => {
    expect(parseTags('db, migrations,,  ops ')).toEqual(['db', 'migrations', 'ops']);
  });

  it('returns undefined when no tag is left', () => {
    expect(parseTags(undefined)).toBeUndefined();
    expect(parseTags(' , ,')).toBeUndefined();
  });
});

describe('parseTime', () => {
  it('parses RFC 3339 timestamps', () => {
    expect(parseTime('since', '2024-05-01T12:00:00Z')?.toISOString()).toBe('2024-05-01T12:00:00.000Z');
    expect(parseTime('since', '2024-05-01T14:00:00+02:00')?.toISOString()).toBe('2024-05-01T12:00:00.000Z');
    expect(parseTime('since', undefined)).toBeUndefined();
  });

  it('rejects other date formats', () => {
    expect(() => parseTime('until', '2024-05-01')).toThrow(ValidationError);
    expect(() => parseTime('until', 'yesterday')).toThrow('until must be an RFC 3339 timestamp, got "yesterday"');
  });
});

describe('parsePositiveInt', () => {
  it('accepts positive integers', () => {
    expect(parsePositiveInt('limit', '10')).toBe(10);
  });

  it('rejects zero, negatives, fractions and words', () => {
    expect(() => parsePositiveInt('limit', '0')).toThrow('limit must be a positive integer, got "0"');
    expect(() => parsePositiveInt('limit', '-2')).toThrow(ValidationError);
    expect(() => parsePositiveInt('top-k', '2.5')).toThrow(ValidationError);
    expect(() => parsePositiveInt('top-k', 'ten')).toThrow(ValidationError);
  });
});

describe('parseJsonValue', () => {
  it('parses JSON values', () => {
    expect(parseJsonValue('{"indent":2}')).toEqual({ indent: 2 });
    expect(parseJsonValue('true')).toBe(true);
    expect(parseJsonValue('[1,"a"]')).toEqual([1, 'a']);
  });

  it('falls back to the raw text', () => {
    expect(parseJsonValue('tabs')).toBe('tabs');
    expect(parseJsonValue('{broken')).toBe('{broken');
  });
});

describe('parseFormat', () => {
  it('accepts text and json', () => {
    expect(parseFormat('text')).toBe('text');
    expect(parseFormat('json')).toBe('json');
    expect(() => parseFormat('yaml')).toThrow('format must be text or json, got "yaml"');
  });
});

describe('resolveProject', () => {
  it('resolves relative paths to absolute ones', () => {
    expect(path.isAbsolute(resolveProject('.'))).toBe(true);
  });
});
