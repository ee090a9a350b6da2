import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    // PGlite boots a full Postgres in WebAssembly per test file.
    hookTimeout: 30_000,
    testTimeout: 30_000,
  },
});
