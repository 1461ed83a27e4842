import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/_tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      NODE_ENV: 'test',
    },
  },
});
