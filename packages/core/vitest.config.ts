import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@clubledger/shared': path.resolve(__dirname, '../shared/src'),
      '@clubledger/db': path.resolve(__dirname, '../db/src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10_000,
    include: ['src/**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/**/*.d.ts'],
    },
  },
});
