/**
 * Per-session read/write locks
 *
 * Writers (upload: embed + insert + persist) are exclusive; readers (index
 * load and retrieval) share. Waiters are served in arrival order, so a
 * writer queued behind readers is not starved by readers that arrive after
 * it. Different sessions never wait on each other.
 *
 * @module services/session/locks
 */

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  get idle(): boolean {
    return this.readers === 0 && !this.writer && this.queue.length === 0;
  }

  acquire(mode: LockMode): Promise<void> {
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: resolve });
      this.drain();
    });
  }

  release(mode: LockMode): void {
    if (mode === 'write') {
      this.writer = false;
    } else {
      this.readers--;
    }
    this.drain();
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next.mode === 'write') {
        if (this.writer || this.readers > 0) return;
        this.writer = true;
      } else {
        if (this.writer) return;
        this.readers++;
      }
      this.queue.shift();
      next.grant();
    }
  }
}

export class SessionLockRegistry {
  private readonly locks = new Map<string, ReadWriteLock>();

  /**
   * Run fn while holding the session's shared lock
   */
  withRead<T>(sessionId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(sessionId, 'read', fn);
  }

  /**
   * Run fn while holding the session's exclusive lock
   */
  withWrite<T>(sessionId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(sessionId, 'write', fn);
  }

  /** Sessions with a held or awaited lock */
  activeSessions(): string[] {
    return [...this.locks.keys()];
  }

  private async run<T>(sessionId: string, mode: LockMode, fn: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(sessionId);
    if (lock === undefined) {
      lock = new ReadWriteLock();
      this.locks.set(sessionId, lock);
    }

    await lock.acquire(mode);
    try {
      return await fn();
    } finally {
      lock.release(mode);
      if (lock.idle) {
        this.locks.delete(sessionId);
      }
    }
  }
}
