import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/src/**/__tests__/**/*.test.ts', 'tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
    // Each PGlite instance boots a full Postgres in WebAssembly
    testTimeout: 60000,
    hookTimeout: 120000,
  },
});
