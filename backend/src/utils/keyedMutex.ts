// backend/src/utils/keyedMutex.ts

/**
 * Runs async tasks one at a time per key. Tasks for different keys run
 * concurrently. A failing task does not block the ones queued after it.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      // Drop the entry once nothing else queued behind this task.
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get size(): number {
    return this.tails.size;
  }
}
