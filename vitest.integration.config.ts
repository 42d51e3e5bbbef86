import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    // Suites share one database and run migrations on start
    fileParallelism: false,
    maxConcurrency: 1,
    testTimeout: 15000,
  },
});
