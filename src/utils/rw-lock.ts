type Waiter = {
  mode: "read" | "write";
  resolve: () => void;
};

/**
 * Async read/write lock: any number of readers, or one writer, never both.
 * Waiters are served in arrival order; a queued writer blocks readers that
 * arrive after it, so writers cannot starve.
 */
export class RwLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  private acquire(mode: Waiter["mode"]): Promise<void> {
    if (this.queue.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ mode, resolve });
    });
  }

  private canEnter(mode: Waiter["mode"]): boolean {
    return mode === "read" ? !this.writing : !this.writing && this.readers === 0;
  }

  private enter(mode: Waiter["mode"]): void {
    if (mode === "read") this.readers++;
    else this.writing = true;
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canEnter(next.mode)) return;
      this.queue.shift();
      this.enter(next.mode);
      next.resolve();
      if (next.mode === "write") return;
    }
  }
}
