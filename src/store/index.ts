export * from './types.js';
export * from './errors.js';
export * from './namespace.js';
export * from './validation.js';
export { globalConfigId } from './records.js';
export { formatTimestamp, parseTimestamp } from './similarity.js';
export { InMemoryStore } from './in-memory.js';
export { SqliteStore, type SqliteStoreOptions } from './sqlite.js';
export { QdrantStore, type QdrantStoreOptions } from './qdrant.js';
export { QdrantRestClient, type PointsClient } from './qdrant-client.js';
export { createStore } from './factory.js';
