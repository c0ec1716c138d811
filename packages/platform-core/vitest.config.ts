import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const packageDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'platform-core',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@metricsim/contracts': path.resolve(packageDir, '../shared/contracts/src/index.ts'),
    },
  },
});
