/**
 * Vitest configuration for all workspace packages
 * Forked workers; several suites bind loopback listeners.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    pool: 'forks',
    testTimeout: 15000
  }
});
