/**
 * Serializes async tasks that share a key; tasks on different keys run freely.
 *
 * Each key maps to the tail of its queue. A new task is chained behind that
 * tail, and the entry is dropped once the last queued task settles. The
 * channel keys it by port, the file dispatcher by bucket path.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();

  /**
   * Run `task` after every task queued earlier for `key` has settled.
   * A failed task does not block the ones behind it.
   */
  runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let tail: Promise<void> = previous;

    const result = previous.then(async () => {
      try {
        return await task();
      } finally {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      }
    });

    tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    return result;
  }

  /** True while a task for `key` is running or queued */
  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  /** Keys with running or queued tasks */
  get size(): number {
    return this.tails.size;
  }
}
