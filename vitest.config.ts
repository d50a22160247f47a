import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['mcp/*/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
