/**
 * Gatehouse - Mutex
 *
 * Promise-based mutual exclusion for stores whose read-modify-write
 * sequences must not interleave. Waiters are served in FIFO order and the
 * lock is released on every exit path.
 */

export interface Mutex {
  acquire(): Promise<() => void>;
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>;
  isLocked(): boolean;
}

export function createMutex(): Mutex {
  const waiters: Array<() => void> = [];
  let locked = false;

  const release = (): void => {
    const next = waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      locked = false;
    }
  };

  const acquire = (): Promise<() => void> => {
    return new Promise<() => void>((resolve) => {
      const grant = (): void => {
        locked = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          release();
        });
      };

      if (!locked) {
        grant();
      } else {
        waiters.push(grant);
      }
    });
  };

  const runExclusive = async <T>(fn: () => Promise<T> | T): Promise<T> => {
    const releaseLock = await acquire();
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  };

  return { acquire, runExclusive, isLocked: () => locked };
}
