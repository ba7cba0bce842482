import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Several suites swap process.env.HOME and PATH; keep files sequential.
    fileParallelism: false,
    pool: 'threads',
    testTimeout: 30_000,
  },
});
