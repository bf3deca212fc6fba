import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    mockReset: true,
    clearMocks: true,
    pool: 'threads',
    include: ['{tools,packages,apps}/*/src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
      reportsDirectory: './coverage',
      include: ['{tools,packages,apps}/*/src/**/*.ts'],
      exclude: ['**/index.ts', '**/*.test.ts'],
    },
  },
});
