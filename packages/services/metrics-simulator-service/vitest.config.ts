import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const packageDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'metrics-simulator-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      '@metricsim/platform-core': path.resolve(packageDir, '../../platform-core/src/index.ts'),
      '@metricsim/contracts': path.resolve(packageDir, '../../shared/contracts/src/index.ts'),
    },
  },
});
