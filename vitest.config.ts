import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases
      '@logpipe/entry': resolve(__dirname, 'packages/entry/src/index.ts'),
      '@logpipe/transform': resolve(__dirname, 'packages/transform/src/index.ts'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
