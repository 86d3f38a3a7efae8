import { formatTimestamp } from './similarity.js';
import type { CallOptions, GlobalConfig, GlobalConfigInput, Group, Note, NoteInput } from './types.js';

/**
 * Stored form of a note: its own copy, tags never missing, createdAt set to
 * now when the caller left it empty.
 */
export function prepareNote(input: NoteInput, now: Date = new Date()): Note {
  const note: Note = structuredClone({ ...input, tags: input.tags ?? [] });
  if (!note.createdAt) {
    note.createdAt = formatTimestamp(now);
  }
  return note;
}

export function globalConfigId(projectId: string, key: string): string {
  return `global:${projectId}:${key}`;
}

export function prepareGlobalConfig(input: GlobalConfigInput, now: Date = new Date()): GlobalConfig {
  return {
    id: globalConfigId(input.projectId, input.key),
    projectId: input.projectId,
    key: input.key,
    value: structuredClone(input.value),
    updatedAt: formatTimestamp(now),
  };
}

/** Oldest first, then by key. */
export function compareGroups(a: Group, b: Group): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  if (a.groupKey !== b.groupKey) return a.groupKey < b.groupKey ? -1 : 1;
  return 0;
}

export function throwIfAborted(options?: CallOptions): void {
  options?.signal?.throwIfAborted();
}
