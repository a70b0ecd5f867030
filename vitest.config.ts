import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    // Worker-thread statistics tests start tsx-loaded workers.
    testTimeout: 20_000,
  },
});
