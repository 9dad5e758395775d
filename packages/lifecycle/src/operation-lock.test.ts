import { describe, expect, it } from 'vitest';
import { createOperationLock } from './operation-lock.js';

describe('OperationLock', () => {
  it('should run the operation and return its value', async () => {
    const lock = createOperationLock();
    const value = await lock.runExclusive('isRunning', () => 42);
    expect(value).toBe(42);
    expect(lock.current).toBeUndefined();
  });

  it('should queue concurrent operations in arrival order', async () => {
    const lock = createOperationLock();
    const results: number[] = [];

    const operations = Array.from({ length: 4 }, (_, i) =>
      lock.runExclusive('startServer', async () => {
        await new Promise((resolve) => setTimeout(resolve, 10 - i * 2));
        results.push(i);
      })
    );

    await Promise.all(operations);
    expect(results).toEqual([0, 1, 2, 3]);
  });

  it('should report the current operation and waiters', async () => {
    const lock = createOperationLock();
    let releaseFirst: () => void = () => {};
    const first = lock.runExclusive(
      'startServer',
      () => new Promise<void>((resolve) => {
          releaseFirst = () => resolve();
        })
    );
    const second = lock.runExclusive('stopServer', () => lock.current);

    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(lock.current).toBe('startServer');
    expect(lock.pending).toBe(1);

    releaseFirst();
    await first;
    expect(await second).toBe('stopServer');
    expect(lock.pending).toBe(0);
    expect(lock.current).toBeUndefined();
  });

  it('should release the lock when an operation throws', async () => {
    const lock = createOperationLock();

    await expect(
      lock.runExclusive('restartServer', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive('isRunning', () => 'next')).resolves.toBe('next');
  });
});
