import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
    },
  },
  resolve: {
    alias: {
      '@batchline/core': path.resolve(__dirname, 'packages/core/src/index.ts'),
      '@batchline/surrealdb': path.resolve(__dirname, 'packages/surrealdb/src/index.ts'),
      '@batchline/rest': path.resolve(__dirname, 'packages/rest/src/index.ts'),
    },
  },
});
