import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for labelbook
 *
 * Tests live in `__tests__` directories beside the code they cover. Everything
 * runs in-process; filesystem tests use temp directories.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
