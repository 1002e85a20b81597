import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@batchmeter/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'sources',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
