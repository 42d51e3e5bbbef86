import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Unit tests run against in-memory stores; *.int.test.ts need Postgres
    include: ['src/**/__tests__/**/*.{test,spec}.ts'],
    exclude: ['**/*.int.{test,spec}.ts', 'node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/test-utils/**', 'src/scripts/**'],
    },
  },
});
