/**
 * Per-key async mutex. Work for the same key runs one at a time in arrival
 * order; different keys never wait on each other. Only serializes within
 * this process: cross-process races are settled by the storage uniqueness
 * constraints.
 */
export interface KeyedLock {
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
  /** Number of keys with queued or running work. */
  pending(): number;
}

export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await task();
      } finally {
        release();
        if (tails.get(key) === tail) tails.delete(key);
      }
    },

    pending(): number {
      return tails.size;
    },
  };
}
