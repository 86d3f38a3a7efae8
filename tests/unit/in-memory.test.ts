import { describe, it, expect, vi } from 'vitest';
import { InMemoryStore } from '../../src/store/in-memory.js';
import type { Logger } from '../../src/util/logger.js';
import { NAMESPACE, PROJECT, note, runStoreContract, vec } from './store-contract.js';

runStoreContract('in-memory', () => ({ store: new InMemoryStore() }));

describe('InMemoryStore', () => {
  it('does not alias the caller embedding', async () => {
    const store = new InMemoryStore();
    await store.initialize(NAMESPACE);

    const embedding = vec(1, 0, 0, 0);
    await store.addNote(note('n1'), embedding);
    embedding[0] = -1;

    const [result] = await store.search(vec(1, 0, 0, 0), { projectId: PROJECT, topK: 1 });
    expect(result.score).toBeCloseTo(1, 6);
  });

  it('scores vectors of a different length as maximally distant', async () => {
    const store = new InMemoryStore();
    await store.initialize(NAMESPACE);
    await store.addNote(note('n1'), vec(1, 0, 0, 0));

    const results = await store.search(vec(1, 0, 0), { projectId: PROJECT, topK: 1 });
    expect(results).toHaveLength(1);
    expect(results[0].score).toBe(0);
  });

  it('drops everything on close', async () => {
    const store = new InMemoryStore();
    await store.initialize(NAMESPACE);
    await store.addNote(note('n1'), vec(1, 0, 0, 0));
    await store.close();

    await store.initialize(NAMESPACE);
    expect(await store.listRecent({ projectId: PROJECT, limit: 10 })).toEqual([]);
  });

  it('logs unparsable createdAt values while listing', async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const store = new InMemoryStore(logger);
    await store.initialize(NAMESPACE);
    await store.addNote(note('n1', { createdAt: 'soon' }), vec(1, 0, 0, 0));

    await store.listRecent({ projectId: PROJECT, limit: 10 });
    expect(logger.warn).toHaveBeenCalledWith('unparsable createdAt on note n1: soon');
  });

  it('lets concurrent writers finish without losing notes', async () => {
    const store = new InMemoryStore();
    await store.initialize(NAMESPACE);

    await Promise.all(
      Array.from({ length: 20 }, (_, i) => store.addNote(note(`n${i}`), vec(1, i, 0, 0)))
    );

    const recent = await store.listRecent({ projectId: PROJECT, limit: 100 });
    expect(recent).toHaveLength(20);
  });
});
