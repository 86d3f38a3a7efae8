import * as fs from 'fs';
import Database from 'better-sqlite3';
import {
  NotFoundError,
  NotInitializedError,
  StoreOperationError,
  wrapError,
} from './errors.js';
import { JsonValueSchema, MetadataSchema, TagsSchema, parseJson } from './json.js';
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

export const DEFAULT_LARGE_NOTE_THRESHOLD = 5000;

export interface SqliteStoreOptions {
  /** Note count at which the one-time scale advisory is logged. */
  largeNoteThreshold?: number;
  logger?: Logger;
}

/**
 * Single-file backend on better-sqlite3. Embeddings are kept as raw
 * little-endian float32 blobs and every search rescans the project's rows;
 * there is no vector index.
 */
export class SqliteStore implements Store {
  readonly kind = 'sqlite';

  private db: Database.Database | null;
  private namespace: string | null = null;
  private warnedLargeNamespace = false;
  private readonly lock = new ReadWriteLock();
  private readonly largeNoteThreshold: number;
  private readonly logger: Logger;

  constructor(private readonly dbPath: string, options: SqliteStoreOptions = {}) {
    this.largeNoteThreshold = options.largeNoteThreshold ?? DEFAULT_LARGE_NOTE_THRESHOLD;
    this.logger = options.logger ?? silentLogger;

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
    } catch (err) {
      throw wrapError('open', err);
    }

    // Restrict database file permissions (owner read/write only)
    if (dbPath !== ':memory:') {
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch (err) {
        this.logger.debug(`could not restrict permissions on ${dbPath}: ${String(err)}`);
      }
    }
  }

  async initialize(namespace: string, options?: CallOptions): Promise<void> {
    throwIfAborted(options);
    await this.lock.write(() => {
      if (!this.db) {
        throw new StoreOperationError('initialize', `database is closed: ${this.dbPath}`);
      }
      if (this.namespace !== null && this.namespace !== namespace) {
        throw new StoreOperationError(
          'initialize',
          `store is bound to namespace ${this.namespace}, cannot switch to ${namespace}`
        );
      }
      try {
        runMigrations(this.db);
      } catch (err) {
        throw wrapError('initialize', err);
      }
      this.namespace = namespace;
    });
  }

  async close(): Promise<void> {
    await this.lock.write(() => {
      this.namespace = null;
      if (this.db) {
        this.db.close();
        this.db = null;
      }
    });
  }

  async addNote(input: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note> {
    const note = prepareNote(input);
    await this.guard('addNote', 'write', options, ({ db, namespace }) => {
      db.prepare<NoteRowParams>(`
        INSERT INTO notes (id, namespace, projectId, groupId, title, text, tags, source, createdAt, metadata, embedding)
        VALUES (@id, @namespace, @projectId, @groupId, @title, @text, @tags, @source, @createdAt, @metadata, @embedding)
        ON CONFLICT(namespace, id) DO UPDATE SET
          projectId = excluded.projectId,
          groupId = excluded.groupId,
          title = excluded.title,
          text = excluded.text,
          tags = excluded.tags,
          source = excluded.source,
          createdAt = excluded.createdAt,
          metadata = excluded.metadata,
          embedding = excluded.embedding
      `).run(noteToParams(note, namespace, embedding));

      this.checkNoteCount(db, namespace);
    });
    return note;
  }

  async get(id: string, options?: CallOptions): Promise<Note> {
    return this.guard('get', 'read', options, ({ db, namespace }) => {
      const row = db.prepare<[string, string], NoteRow>(`
        SELECT id, projectId, groupId, title, text, tags, source, createdAt, metadata
        FROM notes WHERE namespace = ? AND id = ?
      `).get(namespace, id);

      if (!row) throw new NotFoundError('note', id);
      return rowToNote(row);
    });
  }

  async update(input: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note> {
    const note = prepareNote(input);
    await this.guard('update', 'write', options, ({ db, namespace }) => {
      const result = db.prepare<NoteRowParams>(`
        UPDATE notes
        SET projectId = @projectId, groupId = @groupId, title = @title, text = @text, tags = @tags,
            source = @source, createdAt = @createdAt, metadata = @metadata, embedding = @embedding
        WHERE namespace = @namespace AND id = @id
      `).run(noteToParams(note, namespace, embedding));

      if (result.changes === 0) throw new NotFoundError('note', note.id);
    });
    return note;
  }

  async delete(id: string, options?: CallOptions): Promise<void> {
    await this.guard('delete', 'write', options, ({ db, namespace }) => {
      const result = db.prepare<[string, string]>(`
        DELETE FROM notes WHERE namespace = ? AND id = ?
      `).run(namespace, id);

      if (result.changes === 0) throw new NotFoundError('note', id);
    });
  }

  // Full scan of the project's rows, scored in JS (no sqlite-vec dependency)
  async search(embedding: Float32Array, opts: SearchOptions, options?: CallOptions): Promise<SearchResult[]> {
    return this.guard('search', 'read', options, ({ db, namespace }) => {
      const rows = db.prepare<[string, string], NoteRow & { embedding: Buffer | null }>(`
        SELECT id, projectId, groupId, title, text, tags, source, createdAt, metadata, embedding
        FROM notes WHERE namespace = ? AND projectId = ?
      `).all(namespace, opts.projectId);

      const results: SearchResult[] = [];
      for (const row of rows) {
        const note = rowToNote(row);
        if (!matchesSearch(note, opts)) continue;

        const distance = cosineDistance(embedding, decodeEmbedding(row.embedding));
        results.push({ note, score: scoreFromDistance(distance) });
      }

      return rankResults(results, opts.topK);
    });
  }

  async listRecent(opts: ListOptions, options?: CallOptions): Promise<Note[]> {
    return this.guard('listRecent', 'read', options, ({ db, namespace }) => {
      const rows = db.prepare<[string, string], NoteRow>(`
        SELECT id, projectId, groupId, title, text, tags, source, createdAt, metadata
        FROM notes WHERE namespace = ? AND projectId = ?
      `).all(namespace, opts.projectId);

      const notes = rows.map(rowToNote).filter((note) => matchesScope(note, opts));
      return sortRecent(notes, this.logger).slice(0, opts.limit);
    });
  }

  async upsertGlobal(input: GlobalConfigInput, options?: CallOptions): Promise<GlobalConfig> {
    const config = prepareGlobalConfig(input);
    await this.guard('upsertGlobal', 'write', options, ({ db, namespace }) => {
      db.prepare<[string, string, string, string, string, string]>(`
        INSERT INTO global_configs (id, namespace, projectId, key, value, updatedAt)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(namespace, projectId, key) DO UPDATE SET
          id = excluded.id,
          value = excluded.value,
          updatedAt = excluded.updatedAt
      `).run(
        config.id,
        namespace,
        config.projectId,
        config.key,
        JSON.stringify(config.value),
        config.updatedAt
      );
    });
    return config;
  }

  async getGlobal(projectId: string, key: string, options?: CallOptions): Promise<GlobalConfig | null> {
    return this.guard('getGlobal', 'read', options, ({ db, namespace }) => {
      const row = db.prepare<[string, string, string], GlobalConfigRow>(`
        SELECT id, projectId, key, value, updatedAt
        FROM global_configs WHERE namespace = ? AND projectId = ? AND key = ?
      `).get(namespace, projectId, key);

      return row ? rowToGlobalConfig(row) : null;
    });
  }

  async getGlobalById(id: string, options?: CallOptions): Promise<GlobalConfig> {
    return this.guard('getGlobalById', 'read', options, ({ db, namespace }) => {
      const row = db.prepare<[string, string], GlobalConfigRow>(`
        SELECT id, projectId, key, value, updatedAt
        FROM global_configs WHERE namespace = ? AND id = ?
      `).get(namespace, id);

      if (!row) throw new NotFoundError('global config', id);
      return rowToGlobalConfig(row);
    });
  }

  async deleteGlobalById(id: string, options?: CallOptions): Promise<void> {
    await this.guard('deleteGlobalById', 'write', options, ({ db, namespace }) => {
      const result = db.prepare<[string, string]>(`
        DELETE FROM global_configs WHERE namespace = ? AND id = ?
      `).run(namespace, id);

      if (result.changes === 0) throw new NotFoundError('global config', id);
    });
  }

  async addGroup(group: Group, options?: CallOptions): Promise<void> {
    await this.guard('addGroup', 'write', options, ({ db, namespace }) => {
      db.prepare<GroupRow & { namespace: string }>(`
        INSERT INTO note_groups (id, namespace, projectId, groupKey, title, description, createdAt, updatedAt)
        VALUES (@id, @namespace, @projectId, @groupKey, @title, @description, @createdAt, @updatedAt)
      `).run({ ...group, namespace });
    });
  }

  async getGroup(id: string, options?: CallOptions): Promise<Group> {
    return this.guard('getGroup', 'read', options, ({ db, namespace }) => {
      const row = db.prepare<[string, string], GroupRow>(`
        SELECT id, projectId, groupKey, title, description, createdAt, updatedAt
        FROM note_groups WHERE namespace = ? AND id = ?
      `).get(namespace, id);

      if (!row) throw new NotFoundError('group', id);
      return { ...row };
    });
  }

  async getGroupByKey(projectId: string, groupKey: string, options?: CallOptions): Promise<Group> {
    return this.guard('getGroupByKey', 'read', options, ({ db, namespace }) => {
      const row = db.prepare<[string, string, string], GroupRow>(`
        SELECT id, projectId, groupKey, title, description, createdAt, updatedAt
        FROM note_groups WHERE namespace = ? AND projectId = ? AND groupKey = ?
      `).get(namespace, projectId, groupKey);

      if (!row) throw new NotFoundError('group', `${projectId}/${groupKey}`);
      return { ...row };
    });
  }

  async updateGroup(group: Group, options?: CallOptions): Promise<void> {
    await this.guard('updateGroup', 'write', options, ({ db, namespace }) => {
      const result = db.prepare<[string, string, string, string, string]>(`
        UPDATE note_groups SET title = ?, description = ?, updatedAt = ?
        WHERE namespace = ? AND id = ?
      `).run(group.title, group.description, group.updatedAt, namespace, group.id);

      if (result.changes === 0) throw new NotFoundError('group', group.id);
    });
  }

  async deleteGroup(id: string, options?: CallOptions): Promise<void> {
    await this.guard('deleteGroup', 'write', options, ({ db, namespace }) => {
      const result = db.prepare<[string, string]>(`
        DELETE FROM note_groups WHERE namespace = ? AND id = ?
      `).run(namespace, id);

      if (result.changes === 0) throw new NotFoundError('group', id);
    });
  }

  async listGroups(projectId: string, options?: CallOptions): Promise<Group[]> {
    return this.guard('listGroups', 'read', options, ({ db, namespace }) => {
      const rows = db.prepare<[string, string], GroupRow>(`
        SELECT id, projectId, groupKey, title, description, createdAt, updatedAt
        FROM note_groups WHERE namespace = ? AND projectId = ?
      `).all(namespace, projectId);

      return rows.map((row) => ({ ...row })).sort(compareGroups);
    });
  }

  /** Number of notes stored under the bound namespace. */
  async countNotes(options?: CallOptions): Promise<number> {
    return this.guard('countNotes', 'read', options, ({ db, namespace }) => countNotes(db, namespace));
  }

  private async guard<T>(
    operation: string,
    mode: 'read' | 'write',
    options: CallOptions | undefined,
    fn: (ctx: { db: Database.Database; namespace: string }) => T
  ): Promise<T> {
    throwIfAborted(options);
    const exec = (): T => {
      const ctx = this.requireDb();
      try {
        return fn(ctx);
      } catch (err) {
        throw wrapError(operation, err);
      }
    };
    return mode === 'read' ? this.lock.read(exec) : this.lock.write(exec);
  }

  private requireDb(): { db: Database.Database; namespace: string } {
    if (!this.db || this.namespace === null) throw new NotInitializedError();
    return { db: this.db, namespace: this.namespace };
  }

  private checkNoteCount(db: Database.Database, namespace: string): void {
    if (this.warnedLargeNamespace) return;

    const count = countNotes(db, namespace);
    if (count >= this.largeNoteThreshold) {
      this.warnedLargeNamespace = true;
      this.logger.warn(
        `namespace ${namespace} holds ${count} notes (threshold ${this.largeNoteThreshold}); ` +
          'searches scan every row, consider the qdrant backend for collections this size'
      );
    }
  }
}

function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT DEFAULT (datetime('now'))
    );
  `);

  const appliedMigrations = new Set(
    db.prepare<[], { name: string }>('SELECT name FROM migrations').all().map((row) => row.name)
  );

  // Migration 001: notes and global configs, scoped by namespace
  if (!appliedMigrations.has('001_initial')) {
    db.transaction(() => {
      db.exec(`
        CREATE TABLE notes (
          id TEXT NOT NULL,
          namespace TEXT NOT NULL,
          projectId TEXT NOT NULL,
          groupId TEXT NOT NULL,
          title TEXT,
          text TEXT NOT NULL,
          tags TEXT NOT NULL DEFAULT '[]',
          source TEXT,
          createdAt TEXT,
          metadata TEXT,
          embedding BLOB,
          PRIMARY KEY (namespace, id)
        );

        CREATE TABLE global_configs (
          id TEXT NOT NULL,
          namespace TEXT NOT NULL,
          projectId TEXT NOT NULL,
          key TEXT NOT NULL,
          value TEXT,
          updatedAt TEXT,
          PRIMARY KEY (namespace, id),
          UNIQUE (namespace, projectId, key)
        );

        CREATE INDEX idx_notes_project ON notes(namespace, projectId);
        CREATE INDEX idx_notes_group ON notes(namespace, projectId, groupId);
      `);
      db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_initial');
    })();
  }

  // Migration 002: groups
  if (!appliedMigrations.has('002_groups')) {
    db.transaction(() => {
      db.exec(`
        CREATE TABLE note_groups (
          id TEXT NOT NULL,
          namespace TEXT NOT NULL,
          projectId TEXT NOT NULL,
          groupKey TEXT NOT NULL,
          title TEXT NOT NULL,
          description TEXT NOT NULL DEFAULT '',
          createdAt TEXT NOT NULL,
          updatedAt TEXT NOT NULL,
          PRIMARY KEY (namespace, id),
          UNIQUE (namespace, projectId, groupKey)
        );
      `);
      db.prepare('INSERT INTO migrations (name) VALUES (?)').run('002_groups');
    })();
  }
}

function countNotes(db: Database.Database, namespace: string): number {
  const row = db.prepare<[string], { count: number }>(
    'SELECT COUNT(*) AS count FROM notes WHERE namespace = ?'
  ).get(namespace);
  return row?.count ?? 0;
}

/** Fixed-width little-endian float32 block, 4 bytes per component. */
export function encodeEmbedding(embedding: ArrayLike<number>): Buffer {
  const buffer = Buffer.alloc(embedding.length * 4);
  for (let i = 0; i < embedding.length; i++) {
    buffer.writeFloatLE(embedding[i], i * 4);
  }
  return buffer;
}

export function decodeEmbedding(blob: Buffer | null): Float32Array {
  if (!blob || blob.length === 0) return new Float32Array(0);
  const embedding = new Float32Array(Math.floor(blob.length / 4));
  for (let i = 0; i < embedding.length; i++) {
    embedding[i] = blob.readFloatLE(i * 4);
  }
  return embedding;
}

// Database row types
interface NoteRow {
  id: string;
  projectId: string;
  groupId: string;
  title: string | null;
  text: string;
  tags: string | null;
  source: string | null;
  createdAt: string | null;
  metadata: string | null;
}

interface NoteRowParams extends NoteRow {
  namespace: string;
  tags: string;
  embedding: Buffer;
}

interface GlobalConfigRow {
  id: string;
  projectId: string;
  key: string;
  value: string | null;
  updatedAt: string | null;
}

interface GroupRow {
  id: string;
  projectId: string;
  groupKey: string;
  title: string;
  description: string;
  createdAt: string;
  updatedAt: string;
}

function noteToParams(note: Note, namespace: string, embedding: Float32Array): NoteRowParams {
  return {
    id: note.id,
    namespace,
    projectId: note.projectId,
    groupId: note.groupId,
    title: note.title ?? null,
    text: note.text,
    tags: JSON.stringify(note.tags),
    source: note.source ?? null,
    createdAt: note.createdAt ?? null,
    metadata: note.metadata !== undefined ? JSON.stringify(note.metadata) : null,
    embedding: encodeEmbedding(embedding),
  };
}

function rowToNote(row: NoteRow): Note {
  const note: Note = {
    id: row.id,
    projectId: row.projectId,
    groupId: row.groupId,
    text: row.text,
    tags: row.tags ? parseJson(TagsSchema, row.tags) : [],
  };

  if (row.title !== null) note.title = row.title;
  if (row.source !== null) note.source = row.source;
  if (row.createdAt !== null) note.createdAt = row.createdAt;
  if (row.metadata !== null && row.metadata !== '') {
    note.metadata = parseJson(MetadataSchema, row.metadata);
  }

  return note;
}

function rowToGlobalConfig(row: GlobalConfigRow): GlobalConfig {
  return {
    id: row.id,
    projectId: row.projectId,
    key: row.key,
    value: row.value ? parseJson(JsonValueSchema, row.value) : null,
    updatedAt: row.updatedAt ?? '',
  };
}
