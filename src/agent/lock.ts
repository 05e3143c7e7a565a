// pattern: Imperative Shell

/**
 * At most one in-flight step per agent id.
 * Waiters are served in arrival order; different keys never block each other.
 */

type Release = () => void;

type Waiter = {
  resolve: (release: Release) => void;
  reject: (err: Error) => void;
  timeout?: NodeJS.Timeout;
};

/**
 * Present in the map while the key is held.
 */
type KeyState = {
  queue: Array<Waiter>;
};

export class LockTimeoutError extends Error {
  constructor(
    public readonly key: string,
    public readonly timeoutMs: number,
  ) {
    super(`timed out after ${timeoutMs}ms waiting for lock on ${key}`);
    this.name = 'LockTimeoutError';
  }
}

export type KeyedMutex = {
  acquire(key: string, timeoutMs?: number): Promise<Release>;
  runExclusive<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T>;
  isLocked(key: string): boolean;
};

export function createKeyedMutex(): KeyedMutex {
  const keys = new Map<string, KeyState>();

  function release(key: string): void {
    const state = keys.get(key);
    if (!state) {
      return;
    }
    const next = state.queue.shift();
    if (!next) {
      keys.delete(key);
      return;
    }
    if (next.timeout) {
      clearTimeout(next.timeout);
    }
    next.resolve(once(key));
  }

  function once(key: string): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      release(key);
    };
  }

  async function acquire(key: string, timeoutMs?: number): Promise<Release> {
    const state = keys.get(key);
    if (!state) {
      keys.set(key, { queue: [] });
      return once(key);
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      if (timeoutMs && timeoutMs > 0) {
        waiter.timeout = setTimeout(() => {
          const idx = state.queue.indexOf(waiter);
          if (idx >= 0) {
            state.queue.splice(idx, 1);
            reject(new LockTimeoutError(key, timeoutMs));
          }
        }, timeoutMs);
      }
      state.queue.push(waiter);
    });
  }

  return {
    acquire,

    async runExclusive<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
      const releaseLock = await acquire(key, timeoutMs);
      try {
        return await fn();
      } finally {
        releaseLock();
      }
    },

    isLocked(key: string): boolean {
      return keys.has(key);
    },
  };
}
