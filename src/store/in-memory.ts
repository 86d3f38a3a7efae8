import { NotFoundError, NotInitializedError, StoreOperationError } from './errors.js';
import { ReadWriteLock } from './lock.js';
import { compareGroups, prepareGlobalConfig, prepareNote, throwIfAborted } from './records.js';
import {
  cosineDistance,
  matchesScope,
  matchesSearch,
  rankResults,
  scoreFromDistance,
  sortRecent,
} from './similarity.js';
import type {
  CallOptions,
  GlobalConfig,
  GlobalConfigInput,
  Group,
  ListOptions,
  Note,
  NoteInput,
  SearchOptions,
  SearchResult,
  Store,
} from './types.js';
import type { Logger } from '../util/logger.js';
import { silentLogger } from '../util/logger.js';

interface NoteEntry {
  note: Note;
  embedding: Float32Array;
}

/**
 * Reference backend. Everything lives in maps behind one reader/writer lock,
 * and every value crossing the API boundary is a fresh copy. The other
 * backends are checked against this one.
 */
export class InMemoryStore implements Store {
  readonly kind = 'memory';

  private notes = new Map<string, NoteEntry>();
  private globals = new Map<string, GlobalConfig>();   // key: global config id
  private groups = new Map<string, Group>();
  private namespace: string | null = null;
  private readonly lock = new ReadWriteLock();

  constructor(private readonly logger: Logger = silentLogger) {}

  async initialize(namespace: string, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(() => {
      if (this.namespace !== null && this.namespace !== namespace) {
        throw new StoreOperationError(
          'initialize',
          `store is bound to namespace ${this.namespace}, cannot switch to ${namespace}`
        );
      }
      this.namespace = namespace;
    });
  }

  async close(): Promise<void> {
    await this.lock.write(() => {
      this.notes = new Map();
      this.globals = new Map();
      this.groups = new Map();
      this.namespace = null;
    });
  }

  async addNote(input: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note> {
    throwIfAborted(options);
    return this.lock.write(() => {
      this.requireInitialized();
      const note = prepareNote(input);
      this.notes.set(note.id, { note, embedding: Float32Array.from(embedding) });
      return structuredClone(note);
    });
  }

  async get(id: string, options?: CallOptions): Promise<Note> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();
      const entry = this.notes.get(id);
      if (!entry) throw new NotFoundError('note', id);
      return structuredClone(entry.note);
    });
  }

  async update(input: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note> {
    throwIfAborted(options);
    return this.lock.write(() => {
      this.requireInitialized();
      if (!this.notes.has(input.id)) throw new NotFoundError('note', input.id);
      const note = prepareNote(input);
      this.notes.set(note.id, { note, embedding: Float32Array.from(embedding) });
      return structuredClone(note);
    });
  }

  async delete(id: string, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(() => {
      this.requireInitialized();
      if (!this.notes.delete(id)) throw new NotFoundError('note', id);
    });
  }

  async search(embedding: Float32Array, opts: SearchOptions, options?: CallOptions): Promise<SearchResult[]> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();

      const results: SearchResult[] = [];
      for (const entry of this.notes.values()) {
        if (!matchesSearch(entry.note, opts)) continue;
        results.push({
          note: entry.note,
          score: scoreFromDistance(cosineDistance(embedding, entry.embedding)),
        });
      }

      return rankResults(results, opts.topK).map((r) => ({
        note: structuredClone(r.note),
        score: r.score,
      }));
    });
  }

  async listRecent(opts: ListOptions, options?: CallOptions): Promise<Note[]> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();

      const matched: Note[] = [];
      for (const entry of this.notes.values()) {
        if (matchesScope(entry.note, opts)) matched.push(entry.note);
      }

      return sortRecent(matched, this.logger)
        .slice(0, opts.limit)
        .map((note) => structuredClone(note));
    });
  }

  async upsertGlobal(input: GlobalConfigInput, options?: CallOptions): Promise<GlobalConfig> {
    throwIfAborted(options);
    return this.lock.write(() => {
      this.requireInitialized();
      const config = prepareGlobalConfig(input);
      this.globals.set(config.id, config);
      return structuredClone(config);
    });
  }

  async getGlobal(projectId: string, key: string, options?: CallOptions): Promise<GlobalConfig | null> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();
      for (const config of this.globals.values()) {
        if (config.projectId === projectId && config.key === key) {
          return structuredClone(config);
        }
      }
      return null;
    });
  }

  async getGlobalById(id: string, options?: CallOptions): Promise<GlobalConfig> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();
      const config = this.globals.get(id);
      if (!config) throw new NotFoundError('global config', id);
      return structuredClone(config);
    });
  }

  async deleteGlobalById(id: string, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(() => {
      this.requireInitialized();
      if (!this.globals.delete(id)) throw new NotFoundError('global config', id);
    });
  }

  async addGroup(group: Group, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(() => {
      this.requireInitialized();
      if (this.groups.has(group.id)) {
        throw new StoreOperationError('addGroup', `group id already exists: ${group.id}`);
      }
      if (this.findGroupByKey(group.projectId, group.groupKey)) {
        throw new StoreOperationError('addGroup', `group key already exists: ${group.groupKey}`);
      }
      this.groups.set(group.id, structuredClone(group));
    });
  }

  async getGroup(id: string, options?: CallOptions): Promise<Group> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();
      const group = this.groups.get(id);
      if (!group) throw new NotFoundError('group', id);
      return structuredClone(group);
    });
  }

  async getGroupByKey(projectId: string, groupKey: string, options?: CallOptions): Promise<Group> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();
      const group = this.findGroupByKey(projectId, groupKey);
      if (!group) throw new NotFoundError('group', `${projectId}/${groupKey}`);
      return structuredClone(group);
    });
  }

  async updateGroup(group: Group, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(() => {
      this.requireInitialized();
      const existing = this.groups.get(group.id);
      if (!existing) throw new NotFoundError('group', group.id);
      this.groups.set(group.id, {
        ...existing,
        title: group.title,
        description: group.description,
        updatedAt: group.updatedAt,
      });
    });
  }

  async deleteGroup(id: string, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(() => {
      this.requireInitialized();
      if (!this.groups.delete(id)) throw new NotFoundError('group', id);
    });
  }

  async listGroups(projectId: string, options?: CallOptions): Promise<Group[]> {
    throwIfAborted(options);
    return this.lock.read(() => {
      this.requireInitialized();
      return [...this.groups.values()]
        .filter((g) => g.projectId === projectId)
        .sort(compareGroups)
        .map((g) => structuredClone(g));
    });
  }

  private findGroupByKey(projectId: string, groupKey: string): Group | undefined {
    for (const group of this.groups.values()) {
      if (group.projectId === projectId && group.groupKey === groupKey) return group;
    }
    return undefined;
  }

  private requireInitialized(): void {
    if (this.namespace === null) throw new NotInitializedError();
  }
}
