import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    reporters: 'default',
    testTimeout: 30000,
    env: {
      NODE_ENV: 'test',
      API_KEYS: 'test-secret,test-secret-2',
      MASTER_API_KEY: 'test-master-secret',
    },
  },
});
