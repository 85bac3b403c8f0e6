type LockMode = "read" | "write";

interface IPendingLock {
  mode: LockMode;
  grant: () => void;
}

export type ReleaseLock = () => void;

/**
 * Async reader/writer lock. Many readers or one writer hold it at a time.
 * Waiters are served in arrival order, and a queued writer blocks readers
 * that arrive after it. Not reentrant.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly pending: IPendingLock[] = [];

  acquireRead(): Promise<ReleaseLock> {
    if (!this.writerActive && this.pending.length === 0) {
      this.activeReaders += 1;
      return Promise.resolve(this.buildRelease("read"));
    }
    return this.enqueue("read");
  }

  acquireWrite(): Promise<ReleaseLock> {
    if (!this.writerActive && this.activeReaders === 0 && this.pending.length === 0) {
      this.writerActive = true;
      return Promise.resolve(this.buildRelease("write"));
    }
    return this.enqueue("write");
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private enqueue(mode: LockMode): Promise<ReleaseLock> {
    return new Promise<ReleaseLock>((resolve) => {
      this.pending.push({
        mode,
        grant: () => resolve(this.buildRelease(mode)),
      });
    });
  }

  private buildRelease(mode: LockMode): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === "write") {
        this.writerActive = false;
      } else {
        this.activeReaders -= 1;
      }
      this.drain();
    };
  }

  private drain(): void {
    if (this.writerActive) return;

    const next = this.pending[0];
    if (!next) return;

    if (next.mode === "write") {
      if (this.activeReaders > 0) return;
      this.pending.shift();
      this.writerActive = true;
      next.grant();
      return;
    }

    while (this.pending.length && this.pending[0]?.mode === "read") {
      const reader = this.pending.shift();
      if (!reader) break;
      this.activeReaders += 1;
      reader.grant();
    }
  }
}
