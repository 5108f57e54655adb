import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['__tests__/**/*.test.ts'],
    environment: 'node',
    // Depth-3 searches run in the suite
    testTimeout: 30_000,
  },
});
