type Waiter = {
  mode: 'read' | 'write';
  resolve: () => void;
};

/**
 * Async reader/writer lock. Any number of readers may hold it together; a
 * writer holds it alone. Waiters are admitted in arrival order, so a queued
 * writer is not starved by readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private acquire(mode: 'read' | 'write'): Promise<void> {
    if (this.queue.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, resolve });
    });
  }

  private canEnter(mode: 'read' | 'write'): boolean {
    if (this.writing) return false;
    return mode === 'read' || this.readers === 0;
  }

  private enter(mode: 'read' | 'write'): void {
    if (mode === 'read') {
      this.readers++;
    } else {
      this.writing = true;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canEnter(next.mode)) return;
      this.queue.shift();
      this.enter(next.mode);
      next.resolve();
      if (next.mode === 'write') return;
    }
  }
}
