/**
 * Keyed Async Mutex
 *
 * Serializes async operations that share a key (a user id, a leaderboard period).
 * Operations on different keys run concurrently. Each key holds a promise chain;
 * the chain is dropped once its last operation settles.
 */

export interface KeyedMutex<K> {
  /** Runs `operation` after every earlier operation on `key` has settled */
  runExclusive<T>(key: K, operation: () => Promise<T>): Promise<T>;
  /** Number of keys with queued or running operations */
  readonly activeKeys: number;
}

export const createKeyedMutex = <K>(): KeyedMutex<K> => {
  const tails = new Map<K, Promise<void>>();

  return {
    async runExclusive<T>(key: K, operation: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;

      try {
        return await operation();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },

    get activeKeys(): number {
      return tails.size;
    },
  };
};
