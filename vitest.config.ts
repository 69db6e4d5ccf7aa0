import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    root: '.',
    include: ['__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Keep the logger off the filesystem while testing
    env: {
      NODE_ENV: 'test',
      LOG_FILE: 'false',
      LOG_LEVEL: 'error',
    },
    testTimeout: 10000,
  },
});
