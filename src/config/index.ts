import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from '../util/logger.js';
import { DATABASE_FILE, expandTilde, getConfigPath, getDefaultConfigDir } from './paths.js';

export const EmbedderConfigSchema = z.object({
  provider: z.enum(['local', 'ollama', 'openai']).default('openai'),
  model: z.string().min(1).default('text-embedding-3-small'),
  // 0 until the first successful embedding reports the real width
  dim: z.number().int().nonnegative().default(0),
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
});

export const StoreConfigSchema = z.object({
  type: z.enum(['memory', 'sqlite', 'qdrant']).default('sqlite'),
  path: z.string().optional(),
  url: z.string().default('http://localhost:6333'),
  apiKey: z.string().optional(),
  largeNoteThreshold: z.number().int().positive().default(5000),
});

export const PathsConfigSchema = z.object({
  dataDir: z.string().default('~/.memvault'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  embedder: EmbedderConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  paths: PathsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type EmbedderConfig = z.infer<typeof EmbedderConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;

const logger = createLogger('config');

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  try {
    const rawConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    logger.warn(`ignoring invalid config at ${configPath}, using defaults: ${errorMessage(error)}`);
    return defaultConfig();
  }
}

/** Writes to a temp file beside the target and renames it into place. */
export function saveConfig(config: Config, configPath: string = getConfigPath()): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true, mode: 0o700 });

  const tempPath = `${configPath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, JSON.stringify(config, null, 2), { mode: 0o600 });
  try {
    fs.renameSync(tempPath, configPath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Environment overrides for values that should not have to live on disk.
 * The result is never saved back.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const resolved = structuredClone(config);

  if (env.OPENAI_API_KEY && resolved.embedder.provider === 'openai' && !resolved.embedder.apiKey) {
    resolved.embedder.apiKey = env.OPENAI_API_KEY;
  }
  if (env.QDRANT_URL) {
    resolved.store.url = env.QDRANT_URL;
  }
  if (env.QDRANT_API_KEY) {
    resolved.store.apiKey = env.QDRANT_API_KEY;
  }

  return resolved;
}

export function getDataDir(config: Config): string {
  return path.resolve(expandTilde(config.paths.dataDir || getDefaultConfigDir()));
}

export function getDatabasePath(config: Config): string {
  if (config.store.path) return path.resolve(expandTilde(config.store.path));
  return path.join(getDataDir(config), DATABASE_FILE);
}

/** Record the embedding width discovered at run time. */
export function persistDimension(dim: number, configPath: string = getConfigPath()): Config {
  const config = loadConfig(configPath);
  config.embedder.dim = dim;
  saveConfig(config, configPath);
  return config;
}

export function setConfigValue(key: string, value: string, configPath: string = getConfigPath()): Config {
  // Work on a plain JSON copy so the walk below needs no knowledge of the schema
  const raw: unknown = JSON.parse(JSON.stringify(loadConfig(configPath)));
  const keys = key.split('.');

  let current = raw;
  for (let i = 0; i < keys.length - 1; i++) {
    if (!isRecord(current)) {
      throw new Error(`Invalid config key: ${key}`);
    }
    current = current[keys[i]];
  }

  if (!isRecord(current)) {
    throw new Error(`Invalid config key: ${key}`);
  }

  const lastKey = keys[keys.length - 1];
  current[lastKey] = coerceValue(key, current[lastKey], value);

  const validated = ConfigSchema.parse(raw);
  saveConfig(validated, configPath);
  return validated;
}

export function getConfigValue(key: string, configPath: string = getConfigPath()): unknown {
  let current: unknown = loadConfig(configPath);
  for (const k of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}

function coerceValue(key: string, existing: unknown, value: string): unknown {
  if (typeof existing === 'number') {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
      throw new Error(`Config key ${key} expects a number, got "${value}"`);
    }
    return parsed;
  }
  if (typeof existing === 'boolean') {
    if (value !== 'true' && value !== 'false') {
      throw new Error(`Config key ${key} expects true or false, got "${value}"`);
    }
    return value === 'true';
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
