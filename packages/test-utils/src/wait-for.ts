import type { WaitForOptions } from './types.js';

/**
 * Wait for a condition to become truthy
 */
export async function waitFor<T>(
  predicate: () => T | Promise<T>,
  options: WaitForOptions = {}
): Promise<T> {
  const {
    timeout = 5000,
    interval = 20,
    errorMessage = 'Timeout waiting for condition'
  } = options;

  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    const result = await predicate();
    if (result) {
      return result;
    }
    await delay(interval);
  }

  throw new Error(`${errorMessage} (timeout: ${timeout}ms)`);
}

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
