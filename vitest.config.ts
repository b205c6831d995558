import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@printlink/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@printlink/simulator': resolve(__dirname, 'packages/simulator/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
