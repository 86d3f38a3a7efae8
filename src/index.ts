export * from './store/index.js';
export {
  ConfigSchema,
  loadConfig,
  saveConfig,
  applyEnvOverrides,
  getConfigValue,
  setConfigValue,
  type Config,
} from './config/index.js';
export { canonicalizeProjectId, getConfigPath } from './config/paths.js';
export {
  createEmbedder,
  EmbeddingError,
  LocalEmbedder,
  OllamaEmbedder,
  OpenAIEmbedder,
  type Embedder,
  type EmbedderOptions,
} from './embeddings/index.js';
export { openMemory, type Memory, type OpenMemoryOptions } from './core/bootstrap.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './util/logger.js';
