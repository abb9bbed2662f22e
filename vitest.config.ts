import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 10_000,
    env: {
      LOG_LEVEL: 'error',
      LOG_TO_FILE: 'false',
    },
  },
});
