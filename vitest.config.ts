import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      THREADLINE_LOG_LEVEL: 'silent',
      THREADLINE_LOG_FORMAT: 'json',
    },
  },
});
