/**
 * Vitest Configuration
 *
 * SCOPE: Unit tests with the network stubbed out (fetch is replaced per test)
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'quakecat',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
    environment: 'node',
    retry: 0,
  },
});
