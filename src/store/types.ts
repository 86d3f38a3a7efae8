// Notes are scoped by project (canonical path) and group; every store instance
// is bound to exactly one namespace ("provider:model:dim").

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Metadata = { [key: string]: JsonValue };

export interface Note {
  id: string;
  projectId: string;
  groupId: string;
  title?: string;
  text: string;
  tags: string[];
  source?: string;
  createdAt?: string;    // ISO-8601 UTC, filled on write when absent
  metadata?: Metadata;
}

// What callers hand to addNote/update: tags may be omitted
export type NoteInput = Omit<Note, 'tags'> & { tags?: string[] };

export interface GlobalConfig {
  id: string;            // always `global:{projectId}:{key}`
  projectId: string;
  key: string;           // must start with "global."
  value: JsonValue;
  updatedAt: string;
}

export interface GlobalConfigInput {
  id?: string;           // ignored, the store derives it
  projectId: string;
  key: string;
  value: JsonValue;
}

export interface Group {
  id: string;
  projectId: string;
  groupKey: string;
  title: string;
  description: string;
  createdAt: string;
  updatedAt: string;
}

export interface SearchOptions {
  projectId: string;
  groupId?: string;
  tags?: string[];
  since?: Date;          // inclusive
  until?: Date;          // exclusive
  topK: number;
}

export interface ListOptions {
  projectId: string;
  groupId?: string;
  tags?: string[];
  limit: number;
}

export interface SearchResult {
  note: Note;
  score: number;         // 0..1, 1 = identical direction
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Operation set every backend implements. All three backends must return the
 * same ids and scores for the same inputs; see `similarity.ts` for the shared
 * filtering and ranking rules.
 */
export interface Store {
  readonly kind: StoreKind;

  initialize(namespace: string, options?: CallOptions): Promise<void>;
  close(): Promise<void>;

  addNote(note: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note>;
  get(id: string, options?: CallOptions): Promise<Note>;
  update(note: NoteInput, embedding: Float32Array, options?: CallOptions): Promise<Note>;
  delete(id: string, options?: CallOptions): Promise<void>;

  search(embedding: Float32Array, opts: SearchOptions, options?: CallOptions): Promise<SearchResult[]>;
  listRecent(opts: ListOptions, options?: CallOptions): Promise<Note[]>;

  upsertGlobal(config: GlobalConfigInput, options?: CallOptions): Promise<GlobalConfig>;
  getGlobal(projectId: string, key: string, options?: CallOptions): Promise<GlobalConfig | null>;
  getGlobalById(id: string, options?: CallOptions): Promise<GlobalConfig>;
  deleteGlobalById(id: string, options?: CallOptions): Promise<void>;

  addGroup(group: Group, options?: CallOptions): Promise<void>;
  getGroup(id: string, options?: CallOptions): Promise<Group>;
  getGroupByKey(projectId: string, groupKey: string, options?: CallOptions): Promise<Group>;
  updateGroup(group: Group, options?: CallOptions): Promise<void>;
  deleteGroup(id: string, options?: CallOptions): Promise<void>;
  listGroups(projectId: string, options?: CallOptions): Promise<Group[]>;
}

export type StoreKind = 'memory' | 'sqlite' | 'qdrant';
