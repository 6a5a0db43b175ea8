import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['server/tests/**/*.test.ts'],
    setupFiles: ['./server/tests/setup/test-env.ts'],
    testTimeout: 30000,
  },
});
