import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Worker-thread warps start a tsx loader per worker.
    testTimeout: 30000
  }
});
