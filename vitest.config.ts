import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './test-output/vitest/coverage',
      include: ['src/lib/**/*.ts'],
      exclude: ['src/test/**', '**/*.test.ts'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    teardownTimeout: 10000,
    // Tests share nothing on disk (temp dirs, in-memory SQLite) but the
    // fetch spies patch globalThis, so keep files in separate workers.
    pool: 'forks',
  },
});
