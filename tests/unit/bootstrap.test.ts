import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { openMemory } from '../../src/core/bootstrap.js';
import { loadConfig } from '../../src/config/index.js';
import { silentLogger } from '../../src/util/logger.js';

function tmpDir(): string {
  const dir = path.join(os.tmpdir(), `memvault-bootstrap-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

describe('openMemory', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = tmpDir();
    configPath = path.join(dir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(config: unknown): void {
    fs.writeFileSync(configPath, JSON.stringify(config));
  }

  it('discovers the dimension, persists it and binds the namespace', async () => {
    writeConfig({ embedder: { provider: 'local', model: 'hash' }, store: { type: 'memory' } });

    const memory = await openMemory({ configPath, env: {}, logger: silentLogger });
    expect(memory.namespace).toBe('local:hash:384');
    expect(memory.store.kind).toBe('memory');
    expect(memory.config.embedder.dim).toBe(384);
    expect(loadConfig(configPath).embedder.dim).toBe(384);
    await memory.close();
  });

  it('skips the probe once the dimension is known', async () => {
    writeConfig({ embedder: { provider: 'local', model: 'hash', dim: 384 }, store: { type: 'memory' } });
    const onDisk = fs.statSync(configPath).mtimeMs;

    const memory = await openMemory({ configPath, env: {}, logger: silentLogger });
    expect(memory.namespace).toBe('local:hash:384');
    expect(fs.statSync(configPath).mtimeMs).toBe(onDisk);
    await memory.close();
  });

  it('stores and finds notes through the sqlite backend', async () => {
    writeConfig({
      embedder: { provider: 'local', model: 'hash' },
      store: { type: 'sqlite', path: path.join(dir, 'data', 'notes.db') },
    });

    const memory = await openMemory({ configPath, env: {}, logger: silentLogger });
    const { store, embedder } = memory;

    await store.addNote(
      { id: 'n1', projectId: dir, groupId: 'global', text: 'run migrations before seeding' },
      await embedder.embed('run migrations before seeding')
    );
    await store.addNote(
      { id: 'n2', projectId: dir, groupId: 'global', text: 'release on fridays is forbidden' },
      await embedder.embed('release on fridays is forbidden')
    );

    const results = await store.search(await embedder.embed('run migrations before seeding'), {
      projectId: dir,
      topK: 1,
    });
    expect(results.map((r) => r.note.id)).toEqual(['n1']);
    expect(results[0].score).toBeCloseTo(1, 5);
    await memory.close();

    expect(fs.existsSync(path.join(dir, 'data', 'notes.db'))).toBe(true);
  });

  it('surfaces embedder configuration errors', async () => {
    writeConfig({ embedder: { provider: 'openai' }, store: { type: 'memory' } });
    await expect(openMemory({ configPath, env: {}, logger: silentLogger })).rejects.toThrow('API key');
  });

  it('passes the discovered width to the logger', async () => {
    writeConfig({ embedder: { provider: 'local', model: 'hash' }, store: { type: 'memory' } });
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const memory = await openMemory({ configPath, env: {}, logger });
    expect(logger.info).toHaveBeenCalledWith(`recorded embedding dimension 384 in ${configPath}`);
    await memory.close();
  });
});
