/**
 * Async Utilities
 */

/**
 * Serializes async work per key.
 *
 * Tasks sharing a key run one after another in submission order; tasks
 * with different keys run concurrently. A failing task does not block the
 * tasks queued behind it.
 *
 * @example
 * const mutex = new KeyedMutex();
 * await mutex.run('category:42:fr', () => repository.upsert(row));
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<unknown>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task, task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      // Only the last queued task clears the slot
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
