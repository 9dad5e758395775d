/**
 * Serializes lifecycle operations on a single manager.
 * Waiters are served in arrival order; the lock is released even when an operation throws.
 */
export type LifecycleOperation =
  | 'isRunning'
  | 'startServer'
  | 'stopServer'
  | 'ensureRunning'
  | 'restartServer'
  | 'getInfo'
  | 'getState';

export type OperationLock = {
  runExclusive<T>(operation: LifecycleOperation, fn: () => Promise<T> | T): Promise<T>;
  /** Operation holding the lock, if any */
  readonly current: LifecycleOperation | undefined;
  /** Number of operations waiting */
  readonly pending: number;
};

export function createOperationLock(): OperationLock {
  const queue: Array<() => void> = [];
  let current: LifecycleOperation | undefined;
  let locked = false;

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      // Hand the lock straight to the next waiter
      next();
    } else {
      locked = false;
      current = undefined;
    }
  };

  const acquire = (operation: LifecycleOperation): Promise<void> =>
    new Promise<void>((resolve) => {
      const take = () => {
        locked = true;
        current = operation;
        resolve();
      };

      if (!locked) {
        take();
      } else {
        queue.push(take);
      }
    });

  const runExclusive = async <T>(operation: LifecycleOperation, fn: () => Promise<T> | T): Promise<T> => {
    await acquire(operation);
    try {
      return await fn();
    } finally {
      release();
    }
  };

  return {
    runExclusive,
    get current() {
      return current;
    },
    get pending() {
      return queue.length;
    }
  };
}
