import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    // No retries - surface issues immediately
    retry: 0,
    testTimeout: 10000,
    env: {
      FC_NUM_RUNS: '100',
    },
  },
});
