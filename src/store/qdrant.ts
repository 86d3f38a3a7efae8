import { createHash } from 'crypto';
import { z } from 'zod';
import {
  ConnectionFailedError,
  NotFoundError,
  NotInitializedError,
  StoreOperationError,
  wrapError,
} from './errors.js';
import { JsonValueSchema, MetadataSchema, parseJson } from './json.js';
import { ReadWriteLock } from './lock.js';
import {
  collectionName,
  globalConfigCollectionName,
  groupCollectionName,
  parseNamespace,
} from './namespace.js';
import type { Condition, Filter, Payload, PointId, PointRecord, PointsClient } from './qdrant-client.js';
import { compareGroups, globalConfigId, prepareGlobalConfig, prepareNote, throwIfAborted } from './records.js';
import {
  matchesScope,
  matchesSearch,
  parseTimestamp,
  rankResults,
  scoreFromSimilarity,
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

// Auxiliary records carry a constant 1-dim vector; they are only ever looked
// up by id or by payload equality.
const PLACEHOLDER_VECTOR = [1];
const SCROLL_PAGE_SIZE = 256;

interface Collections {
  notes: string;
  globals: string;
  groups: string;
}

export interface QdrantStoreOptions {
  /** Address reported in connection errors. */
  target?: string;
  logger?: Logger;
}

/**
 * Remote backend on a Qdrant collection per namespace. Filters run on the
 * server; ranking and truncation reuse the local comparators.
 */
export class QdrantStore implements Store {
  readonly kind = 'qdrant';

  private namespace: string | null = null;
  private collections: Collections | null = null;
  private readonly lock = new ReadWriteLock();
  private readonly target: string;
  private readonly logger: Logger;

  constructor(private readonly client: PointsClient, options: QdrantStoreOptions = {}) {
    this.target = options.target ?? 'qdrant';
    this.logger = options.logger ?? silentLogger;
  }

  async initialize(namespace: string, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(async () => {
      if (this.namespace !== null) {
        if (this.namespace === namespace) return;
        throw new StoreOperationError(
          'initialize',
          `store is bound to namespace ${this.namespace}, cannot switch to ${namespace}`
        );
      }

      let dim: number;
      try {
        dim = parseNamespace(namespace).dim;
      } catch (err) {
        throw wrapError('initialize', err);
      }
      if (dim === 0) {
        throw new StoreOperationError(
          'initialize',
          `embedding dimension for namespace ${namespace} is not resolved yet`
        );
      }

      try {
        await withSignal(this.client.ping(), options?.signal);
      } catch (err) {
        if (options?.signal?.aborted) throw err;
        throw new ConnectionFailedError(this.target, err);
      }

      const collections: Collections = {
        notes: collectionName(namespace),
        globals: globalConfigCollectionName(namespace),
        groups: groupCollectionName(namespace),
      };

      try {
        await withSignal(this.ensureCollections(collections, dim, options), options?.signal);
      } catch (err) {
        throw wrapError('initialize', err);
      }

      this.collections = collections;
      this.namespace = namespace;
    });
  }

  async close(): Promise<void> {
    await this.lock.write(() => {
      this.collections = null;
      this.namespace = null;
    });
  }

  async addNote(input: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note> {
    const note = prepareNote(input);
    await this.call('addNote', options, async ({ notes }) => {
      throwIfAborted(options);
      await this.client.upsert(notes, [
        { id: hashId(note.id), vector: Array.from(embedding), payload: encodeNote(note) },
      ]);
    });
    return note;
  }

  async get(id: string, options?: CallOptions): Promise<Note> {
    return this.call('get', options, async ({ notes }) => {
      const payload = await this.fetchPayload(notes, id, options);
      if (!payload) throw new NotFoundError('note', id);
      return decodeNote(payload);
    });
  }

  async update(input: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note> {
    const note = prepareNote(input);
    await this.call('update', options, async ({ notes }) => {
      if (!(await this.fetchPayload(notes, note.id, options))) throw new NotFoundError('note', note.id);
      throwIfAborted(options);
      await this.client.upsert(notes, [
        { id: hashId(note.id), vector: Array.from(embedding), payload: encodeNote(note) },
      ]);
    });
    return note;
  }

  async delete(id: string, options?: CallOptions): Promise<void> {
    await this.call('delete', options, async ({ notes }) => {
      if (!(await this.fetchPayload(notes, id, options))) throw new NotFoundError('note', id);
      throwIfAborted(options);
      await this.client.delete(notes, [hashId(id)]);
    });
  }

  async search(embedding: Float32Array, opts: SearchOptions, options?: CallOptions): Promise<SearchResult[]> {
    return this.call('search', options, async ({ notes }) => {
      throwIfAborted(options);
      const points = await this.client.query(notes, Array.from(embedding), buildSearchFilter(opts), opts.topK);

      const results: SearchResult[] = [];
      for (const point of points) {
        if (!point.payload) continue;
        const note = decodeNote(point.payload);
        // The server compares float seconds; re-check against the exact bounds
        if (!matchesSearch(note, opts)) continue;
        results.push({ note, score: scoreFromSimilarity(point.score) });
      }

      return rankResults(results, opts.topK);
    });
  }

  async listRecent(opts: ListOptions, options?: CallOptions): Promise<Note[]> {
    return this.call('listRecent', options, async ({ notes: collection }) => {
      const records = await this.scrollAll(collection, buildScopeFilter(opts), options);
      const notes = records
        .flatMap((record) => (record.payload ? [decodeNote(record.payload)] : []))
        .filter((note) => matchesScope(note, opts));

      return sortRecent(notes, this.logger).slice(0, opts.limit);
    });
  }

  async upsertGlobal(input: GlobalConfigInput, options?: CallOptions): Promise<GlobalConfig> {
    const config = prepareGlobalConfig(input);
    await this.call('upsertGlobal', options, async ({ globals }) => {
      throwIfAborted(options);
      await this.client.upsert(globals, [
        { id: hashId(config.id), vector: PLACEHOLDER_VECTOR, payload: encodeGlobalConfig(config) },
      ]);
    });
    return config;
  }

  async getGlobal(projectId: string, key: string, options?: CallOptions): Promise<GlobalConfig | null> {
    return this.call('getGlobal', options, async ({ globals }) => {
      const payload = await this.fetchPayload(globals, globalConfigId(projectId, key), options);
      return payload ? decodeGlobalConfig(payload) : null;
    });
  }

  async getGlobalById(id: string, options?: CallOptions): Promise<GlobalConfig> {
    return this.call('getGlobalById', options, async ({ globals }) => {
      const payload = await this.fetchPayload(globals, id, options);
      if (!payload) throw new NotFoundError('global config', id);
      return decodeGlobalConfig(payload);
    });
  }

  async deleteGlobalById(id: string, options?: CallOptions): Promise<void> {
    await this.call('deleteGlobalById', options, async ({ globals }) => {
      if (!(await this.fetchPayload(globals, id, options))) throw new NotFoundError('global config', id);
      throwIfAborted(options);
      await this.client.delete(globals, [hashId(id)]);
    });
  }

  async addGroup(group: Group, options?: CallOptions): Promise<void> {
    await this.call('addGroup', options, async ({ groups }) => {
      if (await this.fetchPayload(groups, group.id, options)) {
        throw new StoreOperationError('addGroup', `group id already exists: ${group.id}`);
      }
      throwIfAborted(options);
      const page = await this.client.scroll(groups, groupKeyFilter(group.projectId, group.groupKey), 1);
      if (page.points.length > 0) {
        throw new StoreOperationError('addGroup', `group key already exists: ${group.groupKey}`);
      }
      throwIfAborted(options);
      await this.client.upsert(groups, [
        { id: hashId(group.id), vector: PLACEHOLDER_VECTOR, payload: encodeGroup(group) },
      ]);
    });
  }

  async getGroup(id: string, options?: CallOptions): Promise<Group> {
    return this.call('getGroup', options, async ({ groups }) => {
      const payload = await this.fetchPayload(groups, id, options);
      if (!payload) throw new NotFoundError('group', id);
      return decodeGroup(payload);
    });
  }

  async getGroupByKey(projectId: string, groupKey: string, options?: CallOptions): Promise<Group> {
    return this.call('getGroupByKey', options, async ({ groups }) => {
      throwIfAborted(options);
      const page = await this.client.scroll(groups, groupKeyFilter(projectId, groupKey), 1);
      const payload = page.points[0]?.payload;
      if (!payload) throw new NotFoundError('group', `${projectId}/${groupKey}`);
      return decodeGroup(payload);
    });
  }

  async updateGroup(group: Group, options?: CallOptions): Promise<void> {
    await this.call('updateGroup', options, async ({ groups }) => {
      const payload = await this.fetchPayload(groups, group.id, options);
      if (!payload) throw new NotFoundError('group', group.id);

      const updated: Group = {
        ...decodeGroup(payload),
        title: group.title,
        description: group.description,
        updatedAt: group.updatedAt,
      };
      throwIfAborted(options);
      await this.client.upsert(groups, [
        { id: hashId(updated.id), vector: PLACEHOLDER_VECTOR, payload: encodeGroup(updated) },
      ]);
    });
  }

  async deleteGroup(id: string, options?: CallOptions): Promise<void> {
    await this.call('deleteGroup', options, async ({ groups }) => {
      if (!(await this.fetchPayload(groups, id, options))) throw new NotFoundError('group', id);
      throwIfAborted(options);
      await this.client.delete(groups, [hashId(id)]);
    });
  }

  async listGroups(projectId: string, options?: CallOptions): Promise<Group[]> {
    return this.call('listGroups', options, async ({ groups }) => {
      const filter: Filter = { must: [{ key: 'projectId', match: { value: projectId } }] };
      const records = await this.scrollAll(groups, filter, options);
      return records
        .flatMap((record) => (record.payload ? [decodeGroup(record.payload)] : []))
        .sort(compareGroups);
    });
  }

  /**
   * Snapshot the collection names under the read lock, then run the remote
   * calls outside it. The caller stops waiting as soon as the signal aborts,
   * and bodies re-check the signal before each remote call.
   */
  private async call<T>(
    operation: string,
    options: CallOptions | undefined,
    fn: (collections: Collections) => Promise<T>
  ): Promise<T> {
    throwIfAborted(options);
    const collections = await this.lock.read(() => {
      if (!this.collections) throw new NotInitializedError();
      return this.collections;
    });

    try {
      return await withSignal(fn(collections), options?.signal);
    } catch (err) {
      throw wrapError(operation, err);
    }
  }

  /** Payload stored under `id`, or null when absent or owned by another id. */
  private async fetchPayload(collection: string, id: string, options?: CallOptions): Promise<Payload | null> {
    throwIfAborted(options);
    const records = await this.client.retrieve(collection, [hashId(id)]);
    const payload = records[0]?.payload;
    if (!payload || payload.id !== id) return null;
    return payload;
  }

  private async scrollAll(collection: string, filter: Filter, options?: CallOptions): Promise<PointRecord[]> {
    const records: PointRecord[] = [];
    let offset: PointId | undefined;
    do {
      throwIfAborted(options);
      const page = await this.client.scroll(collection, filter, SCROLL_PAGE_SIZE, offset);
      records.push(...page.points);
      offset = page.nextOffset ?? undefined;
    } while (offset !== undefined);
    return records;
  }

  private async ensureCollections(collections: Collections, dim: number, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    if (!(await this.client.collectionExists(collections.notes))) {
      this.logger.info(`creating collection ${collections.notes} (${dim} dims)`);
      await this.client.createCollection(collections.notes, dim);
      await this.client.createPayloadIndex(collections.notes, 'projectId', 'keyword');
      await this.client.createPayloadIndex(collections.notes, 'groupId', 'keyword');
      await this.client.createPayloadIndex(collections.notes, 'tags', 'keyword');
      await this.client.createPayloadIndex(collections.notes, 'createdAtTimestamp', 'float');
    }

    throwIfAborted(options);
    if (!(await this.client.collectionExists(collections.globals))) {
      await this.client.createCollection(collections.globals, PLACEHOLDER_VECTOR.length);
      await this.client.createPayloadIndex(collections.globals, 'projectId', 'keyword');
    }

    throwIfAborted(options);
    if (!(await this.client.collectionExists(collections.groups))) {
      await this.client.createCollection(collections.groups, PLACEHOLDER_VECTOR.length);
      await this.client.createPayloadIndex(collections.groups, 'projectId', 'keyword');
      await this.client.createPayloadIndex(collections.groups, 'groupKey', 'keyword');
    }
  }
}

/**
 * Point id for a string id: the first 128 bits of its SHA-256, written as a
 * UUID. The string id stays in the payload and is what equality checks use.
 */
export function hashId(id: string): string {
  const hex = createHash('sha256').update(id).digest('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function buildScopeFilter(opts: Pick<ListOptions, 'projectId' | 'groupId' | 'tags'>): Filter {
  const must: Condition[] = [{ key: 'projectId', match: { value: opts.projectId } }];
  if (opts.groupId !== undefined) {
    must.push({ key: 'groupId', match: { value: opts.groupId } });
  }
  // A keyword match on an array field hits when any element equals the value
  for (const tag of opts.tags ?? []) {
    must.push({ key: 'tags', match: { value: tag } });
  }
  return { must };
}

export function buildSearchFilter(opts: SearchOptions): Filter {
  const filter = buildScopeFilter(opts);
  if (opts.since || opts.until) {
    const range: { gte?: number; lt?: number } = {};
    if (opts.since) range.gte = opts.since.getTime() / 1000;
    if (opts.until) range.lt = opts.until.getTime() / 1000;
    filter.must.push({ key: 'createdAtTimestamp', range });
  }
  return filter;
}

function groupKeyFilter(projectId: string, groupKey: string): Filter {
  return {
    must: [
      { key: 'projectId', match: { value: projectId } },
      { key: 'groupKey', match: { value: groupKey } },
    ],
  };
}

// Payload codecs

const NotePayloadSchema = z.object({
  id: z.string(),
  projectId: z.string(),
  groupId: z.string(),
  title: z.string().optional(),
  text: z.string(),
  tags: z.array(z.string()).default([]),
  source: z.string().optional(),
  createdAt: z.string().optional(),
  metadata: MetadataSchema.optional(),
});

const GlobalConfigPayloadSchema = z.object({
  id: z.string(),
  projectId: z.string(),
  key: z.string(),
  value: z.string(),
  updatedAt: z.string(),
});

const GroupPayloadSchema = z.object({
  id: z.string(),
  projectId: z.string(),
  groupKey: z.string(),
  title: z.string(),
  description: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export function encodeNote(note: Note): Payload {
  const payload: Payload = {
    id: note.id,
    projectId: note.projectId,
    groupId: note.groupId,
    text: note.text,
    tags: note.tags,
  };

  if (note.title !== undefined) payload.title = note.title;
  if (note.source !== undefined) payload.source = note.source;
  if (note.metadata !== undefined) payload.metadata = note.metadata;
  if (note.createdAt !== undefined) {
    payload.createdAt = note.createdAt;
    const time = parseTimestamp(note.createdAt);
    if (time !== null) payload.createdAtTimestamp = time / 1000;
  }

  return payload;
}

export function decodeNote(payload: Payload): Note {
  return NotePayloadSchema.parse(payload);
}

function encodeGlobalConfig(config: GlobalConfig): Payload {
  return {
    type: 'global_config',
    id: config.id,
    projectId: config.projectId,
    key: config.key,
    value: JSON.stringify(config.value),
    updatedAt: config.updatedAt,
  };
}

function decodeGlobalConfig(payload: Payload): GlobalConfig {
  const parsed = GlobalConfigPayloadSchema.parse(payload);
  return { ...parsed, value: parseJson(JsonValueSchema, parsed.value) };
}

function encodeGroup(group: Group): Payload {
  return { type: 'group', ...group };
}

function decodeGroup(payload: Payload): Group {
  return GroupPayloadSchema.parse(payload);
}

function withSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
