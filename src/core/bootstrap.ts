import {
  applyEnvOverrides,
  loadConfig,
  persistDimension,
  type Config,
} from '../config/index.js';
import { getConfigPath } from '../config/paths.js';
import { createEmbedder, type Embedder } from '../embeddings/index.js';
import { createStore } from '../store/factory.js';
import { generateNamespace } from '../store/namespace.js';
import type { Store } from '../store/types.js';
import { createLogger, type Logger } from '../util/logger.js';

// Text embedded once when the vector width is still unknown
const DIMENSION_PROBE = 'memvault dimension probe';

export interface OpenMemoryOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface Memory {
  store: Store;
  embedder: Embedder;
  config: Config;
  namespace: string;
  close(): Promise<void>;
}

/**
 * Load config, settle the embedding width, and hand back an initialized
 * store bound to the resulting namespace.
 */
export async function openMemory(options: OpenMemoryOptions = {}): Promise<Memory> {
  const configPath = getConfigPath(options.configPath);
  const logger = options.logger ?? createLogger('memvault');
  const loaded = applyEnvOverrides(loadConfig(configPath), options.env);

  const embedder = createEmbedder(loaded.embedder, {
    logger,
    onDimensionDiscovered: (dim) => {
      persistDimension(dim, configPath);
      logger.info(`recorded embedding dimension ${dim} in ${configPath}`);
    },
  });

  if (embedder.dimensions === 0) {
    await embedder.embed(DIMENSION_PROBE, options.signal);
  }

  const config: Config = {
    ...loaded,
    embedder: { ...loaded.embedder, dim: embedder.dimensions },
  };
  const namespace = generateNamespace(config.embedder.provider, config.embedder.model, config.embedder.dim);

  const store = createStore(config, logger);
  try {
    await store.initialize(namespace, { signal: options.signal });
  } catch (err) {
    await store.close();
    throw err;
  }
  logger.debug(`opened ${store.kind} store for namespace ${namespace}`);

  return {
    store,
    embedder,
    config,
    namespace,
    close: () => store.close(),
  };
}
