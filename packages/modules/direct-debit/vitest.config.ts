import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@clubledger/shared': path.resolve(__dirname, '../../shared/src'),
      '@clubledger/db': path.resolve(__dirname, '../../db/src'),
      '@clubledger/core': path.resolve(__dirname, '../../core/src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
  },
});
