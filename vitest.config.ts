import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    env: {
      // Keep test output readable; tests that assert on log lines pass their own logger.
      LOG_LEVEL: 'silent',
    },
  },
});
