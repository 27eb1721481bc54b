import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['server/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Engine suites wait on real abort timers of a few tens of milliseconds.
    testTimeout: 10000,
    hookTimeout: 10000,
    restoreMocks: true,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      include: ['server/**/*.ts', 'shared/**/*.ts'],
      exclude: ['server/__tests__/**', '**/*.d.ts'],
    },
  },
});
