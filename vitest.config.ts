/**
 * Vitest Configuration for Unit and Server Tests
 *
 * Features:
 * - Node.js test environment
 * - Coverage over core/ and server/
 * - Sequential test file execution (fileParallelism: false), servers bind ephemeral ports
 * - Using globals: false for explicit imports
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    env: {
      NODE_ENV: 'test'
    },

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['core/**/*.ts', 'server/**/*.ts', 'ws/**/*.ts'],
      reportsDirectory: 'coverage'
    },

    testTimeout: 15000,
    hookTimeout: 10000,

    pool: 'forks',
    fileParallelism: false,

    globals: false,

    clearMocks: true,
    restoreMocks: true
  }
});
