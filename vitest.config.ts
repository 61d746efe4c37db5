import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'portal-user-stats',
    include: ['backend/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 10000,
  },
});
