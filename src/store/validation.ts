import type { ListOptions, NoteInput, SearchOptions } from './types.js';

// Checks the request layer runs before anything reaches a Store. Backends
// trust their inputs.

export const RESERVED_GROUP = 'global';

const GROUP_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;
const GLOBAL_KEY_PATTERN = /^global\.[a-zA-Z0-9._-]+$/;

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function validateGroupId(groupId: string): void {
  if (!groupId) {
    throw new ValidationError('groupId must not be empty');
  }
  if (!GROUP_ID_PATTERN.test(groupId)) {
    throw new ValidationError(`groupId must match ${GROUP_ID_PATTERN.source}, got "${groupId}"`);
  }
}

/** Same rules as groupId, plus "global" is reserved. */
export function validateGroupKeyForCreate(groupKey: string): void {
  if (groupKey === RESERVED_GROUP) {
    throw new ValidationError(`group key "${RESERVED_GROUP}" is reserved`);
  }
  validateGroupId(groupKey);
}

export function validateGlobalKey(key: string): void {
  if (!key.startsWith('global.')) {
    throw new ValidationError(`key must start with "global.", got "${key}"`);
  }
  if (!GLOBAL_KEY_PATTERN.test(key)) {
    throw new ValidationError(`key must match ${GLOBAL_KEY_PATTERN.source}, got "${key}"`);
  }
}

export function validateNote(note: NoteInput): void {
  if (!note.id) throw new ValidationError('id must not be empty');
  if (!note.projectId) throw new ValidationError('projectId must not be empty');
  validateGroupId(note.groupId);
  if (!note.text) throw new ValidationError('text must not be empty');
}

export function validateSearchOptions(opts: SearchOptions): void {
  if (!opts.projectId) throw new ValidationError('projectId is required');
  if (opts.groupId !== undefined) validateGroupId(opts.groupId);
  requirePositiveInteger('topK', opts.topK);
  if (opts.since && opts.until && opts.since.getTime() >= opts.until.getTime()) {
    throw new ValidationError('since must be before until');
  }
}

export function validateListOptions(opts: ListOptions): void {
  if (!opts.projectId) throw new ValidationError('projectId is required');
  if (opts.groupId !== undefined) validateGroupId(opts.groupId);
  requirePositiveInteger('limit', opts.limit);
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
}
