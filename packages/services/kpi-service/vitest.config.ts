import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    name: 'kpi-service',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@netkpi/platform-core': path.resolve(__dirname, '../../platform-core/src'),
      '@netkpi/shared-contracts': path.resolve(__dirname, '../../shared/contracts/src'),
      '@netkpi/test-utils': path.resolve(__dirname, '../../shared/test-utils/src'),
    },
  },
});
