import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_FILES: 'false',
      LOG_LEVEL: 'error',
    },
    testTimeout: 30000,
  },
});
