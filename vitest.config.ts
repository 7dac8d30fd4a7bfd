import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 30_000,
    env: {
      LOG_TO_FILE: 'false',
      LOG_LEVEL: 'error',
    },
  },
});
