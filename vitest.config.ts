import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    isolate: true,
    testTimeout: 15_000,
    hookTimeout: 30_000,
    include: ['services/**/src/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**']
  }
});
