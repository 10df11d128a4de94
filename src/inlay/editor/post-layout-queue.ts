type Entry = { owner: object; callback: () => void };

/**
 * Callbacks that must run once the next layout has finished, such as
 * scrolling the caret into view. Callbacks queued while flushing wait for the
 * following flush.
 */
export class PostLayoutQueue {
  private entries: Entry[] = [];
  private disposed = false;

  get size(): number {
    return this.entries.length;
  }

  schedule(owner: object, callback: () => void): () => void {
    if (this.disposed) {
      return () => {};
    }
    const entry: Entry = { owner, callback };
    this.entries.push(entry);
    return () => {
      this.entries = this.entries.filter((candidate) => candidate !== entry);
    };
  }

  cancel(owner: object): void {
    this.entries = this.entries.filter((entry) => entry.owner !== owner);
  }

  flush(): void {
    const pending = this.entries;
    this.entries = [];
    for (const entry of pending) {
      try {
        entry.callback();
      } catch (error) {
        console.error("[inlay] post-layout callback failed", error);
      }
    }
  }

  dispose(): void {
    this.entries = [];
    this.disposed = true;
  }
}
