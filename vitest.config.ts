import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['engine/src/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
