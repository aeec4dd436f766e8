import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_SILENT: 'true',
    },
    testTimeout: 20_000,
  },
});
