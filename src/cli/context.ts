import { openMemory, type Memory } from '../core/bootstrap.js';
import { error } from './ui.js';

export function fail(err: unknown): void {
  console.error(error(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
}

/**
 * Open the configured store, run the command body, and close the store
 * whether or not the body succeeded.
 */
export async function withMemory(fn: (memory: Memory) => Promise<void>): Promise<void> {
  let memory: Memory | undefined;
  try {
    memory = await openMemory();
    await fn(memory);
  } catch (err) {
    fail(err);
  } finally {
    await memory?.close();
  }
}
