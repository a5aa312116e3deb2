import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['keyenv/typescript/src/**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/__tests__/**',
        '**/__mocks__/**',
        '**/__fixtures__/**',
        'keyenv/typescript/examples/**',
      ],
    },
    testTimeout: 10000,
  },
});
