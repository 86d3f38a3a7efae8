import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const CONFIG_DIR = '.memvault';
export const CONFIG_FILE = 'config.json';
export const DATABASE_FILE = 'memvault.db';

export function expandTilde(input: string): string {
  if (input === '~') return os.homedir();
  if (input.startsWith('~/')) return path.join(os.homedir(), input.slice(2));
  return input;
}

export function getDefaultConfigDir(): string {
  return path.join(os.homedir(), CONFIG_DIR);
}

/** Explicit path, then MEMVAULT_CONFIG, then ~/.memvault/config.json. */
export function getConfigPath(override?: string): string {
  const configured = override ?? process.env.MEMVAULT_CONFIG;
  if (configured) return path.resolve(expandTilde(configured));
  return path.join(getDefaultConfigDir(), CONFIG_FILE);
}

/**
 * Canonical form of a project path: tilde expanded, absolute, symlinks
 * resolved. A path that does not exist yet keeps its absolute form.
 */
export function canonicalizeProjectId(input: string): string {
  const absolute = path.resolve(expandTilde(input));
  try {
    return fs.realpathSync(absolute);
  } catch {
    return absolute;
  }
}
