import * as fs from 'fs';
import * as path from 'path';
import type { Config } from '../config/index.js';
import { getDatabasePath } from '../config/index.js';
import type { Logger } from '../util/logger.js';
import { InMemoryStore } from './in-memory.js';
import { QdrantRestClient } from './qdrant-client.js';
import { QdrantStore } from './qdrant.js';
import { SqliteStore } from './sqlite.js';
import type { Store } from './types.js';

/** Construct (but do not initialize) the backend the config selects. */
export function createStore(config: Config, logger: Logger): Store {
  switch (config.store.type) {
    case 'memory':
      return new InMemoryStore(logger);

    case 'sqlite': {
      const dbPath = getDatabasePath(config);
      fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
      return new SqliteStore(dbPath, {
        largeNoteThreshold: config.store.largeNoteThreshold,
        logger,
      });
    }

    case 'qdrant':
      return new QdrantStore(
        new QdrantRestClient({ url: config.store.url, apiKey: config.store.apiKey }),
        { target: config.store.url, logger }
      );
  }
}
