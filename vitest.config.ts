import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/src/**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/**/src/**/*.ts'],
      exclude: [
        'packages/**/src/**/__tests__/**',
        'packages/admin-api/src/main.ts', // Process entry point
        'packages/cli/src/bin/**', // CLI entry point
      ],
    },
    testTimeout: 10000,
  },
});
