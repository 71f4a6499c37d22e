import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@rowkit/core': path.resolve(__dirname, 'packages/core/src'),
      '@rowkit/postgresql': path.resolve(__dirname, 'packages/postgresql/src'),
    },
  },
});
