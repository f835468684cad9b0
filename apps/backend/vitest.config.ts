import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: { NODE_ENV: 'test', LOG_LEVEL: 'error' },
    testTimeout: 20_000,
    hookTimeout: 20_000,
    isolate: true,
  },
});
