/**
 * Serializes async tasks per key. Tasks sharing a key run one after another
 * in arrival order; tasks on different keys do not wait on each other.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }
}
